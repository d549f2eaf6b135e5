import yargs from 'yargs'
import { auditCommand } from './commands/audit.js'
import { licenseCommand } from './commands/license.js'
import { listCommand } from './commands/list.js'

/**
 * Configuration options for running oss-audit programmatically.
 */
export interface AuditRunOptions {
  /** Fail the audit when denied packages are used. */
  strict?: boolean
  /** Enable debug logging. */
  debug?: boolean
  /** Maximum parallel license lookups. */
  concurrency?: number
  /** Wait between license lookup retries, in milliseconds. */
  retryDelayMs?: number
}

/**
 * Run oss-audit programmatically with provided arguments and options.
 * Maps options to environment variables before executing yargs commands.
 *
 * @param args - Command line arguments to pass to yargs (e.g., ['audit', '--graph', 'graph.json', '--target', '//app:server']).
 * @param options - Configuration options that override environment variables.
 * @returns Exit code (0 for success, non-zero for failure).
 */
export async function runAudit(
  args: string[],
  options?: AuditRunOptions,
): Promise<number> {
  if (options?.strict) {
    process.env.OSS_AUDIT_STRICT = '1'
  }
  if (options?.debug) {
    process.env.OSS_AUDIT_DEBUG = '1'
  }
  if (options?.concurrency !== undefined) {
    process.env.OSS_AUDIT_CONCURRENCY = String(options.concurrency)
  }
  if (options?.retryDelayMs !== undefined) {
    process.env.OSS_AUDIT_RETRY_DELAY_MS = String(options.retryDelayMs)
  }

  try {
    await yargs(args)
      .scriptName('oss-audit')
      .usage('$0 <command> [options]')
      .command(auditCommand)
      .command(licenseCommand)
      .command(listCommand)
      .demandCommand(1, 'You must specify a command')
      .help()
      .alias('h', 'help')
      .strict()
      .parse()

    return 0
  } catch (error) {
    if (process.env.OSS_AUDIT_DEBUG) {
      console.error('oss-audit error:', error)
    }
    return 1
  }
}
