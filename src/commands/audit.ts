import * as fs from 'fs/promises'
import * as path from 'path'
import type { CommandModule } from 'yargs'
import { auditTarget, type AuditResult } from '../audit/audit.js'
import {
  createBomDocument,
  createIssuesDocument,
  writeBom,
} from '../bom/document.js'
import { BOM_FILE_SUFFIX, BOM_ISSUES_FILE_SUFFIX } from '../constants.js'
import { loadJsonGraph } from '../graph/json-graph.js'
import { PomLicenseResolver } from '../license/pom-resolver.js'
import type { LicenseResolver } from '../license/types.js'
import { PolicyList, loadPolicyList } from '../policy/policy-list.js'
import type { AuditSummary } from '../types.js'
import { debug, formatAuditSummary } from '../utils.js'
import { getAuditConfigFromEnv } from '../utils/config.js'
import { createSpinner } from '../utils/spinner.js'

interface AuditArgs {
  graph: string
  target: string
  'approved-list'?: string
  'denied-list'?: string
  suppress: string[]
  strict: boolean
  debug: boolean
  concurrency?: number
  'output-dir': string
  'output-prefix'?: string
  json: boolean
}

export interface PerformAuditParams {
  graphPath: string
  target: string
  approvedListPath?: string
  deniedListPath?: string
  suppress?: ReadonlyArray<string>
  strict?: boolean
  debug?: boolean
  concurrency?: number
  outputDir: string
  outputPrefix?: string
  /** Defaults to the POM license resolver */
  resolver?: LicenseResolver
  retryDelayMs?: number
  /** Hide progress output */
  silent?: boolean
}

export interface PerformAuditResult {
  result: AuditResult
  summary: AuditSummary
}

/**
 * Default file name prefix for a target: its name after the last ":" or "/".
 * e.g., "//app/server:main" -> "main"
 */
export function outputPrefixForTarget(target: string): string {
  const name = target.slice(Math.max(target.lastIndexOf(':'), target.lastIndexOf('/')) + 1)
  return name || 'oss-audit'
}

/**
 * Banner listing denied packages found in the build
 */
export function formatDeniedAlert(
  denied: ReadonlyArray<string>,
  bomPath: string,
  deniedListPath?: string,
): string {
  return [
    'ALERT: open source packages denied for use were found in this build.',
    'They must be removed from product code before the build complies with',
    'license requirements:',
    '',
    ...denied.map(coordinate => `  ${coordinate}`),
    '',
    'Catalog of packages used by this build:',
    `  ${bomPath}`,
    '',
    'Catalog of denied packages:',
    `  ${deniedListPath ?? '(none)'}`,
    '',
  ].join('\n')
}

/**
 * Audit a target of a graph export and write its BOM and BOM-issues files.
 * Both files are written whatever the verdict.
 */
export async function performAudit(
  params: PerformAuditParams,
): Promise<PerformAuditResult> {
  const [graph, approved, denied] = await Promise.all([
    loadJsonGraph(params.graphPath),
    params.approvedListPath
      ? loadPolicyList(params.approvedListPath)
      : PolicyList.empty(),
    params.deniedListPath
      ? loadPolicyList(params.deniedListPath)
      : PolicyList.empty(),
  ])
  debug(
    `Loaded ${graph.size} graph node(s), ${approved.size} approved and ${denied.size} denied entries`,
  )

  const resolver =
    params.resolver ??
    new PomLicenseResolver({ retryDelayMs: params.retryDelayMs })

  const spinner = createSpinner({ disabled: params.silent })
  spinner.start(`Auditing ${params.target}...`)

  let result: AuditResult
  try {
    result = await auditTarget(graph, params.target, {
      resolver,
      approved,
      denied,
      suppress: params.suppress,
      strict: params.strict,
      debug: params.debug,
      concurrency: params.concurrency,
      onProgress: (_url, done, total) =>
        spinner.progress('Resolving licenses', done, total),
    })
  } catch (err) {
    spinner.fail(`Audit of ${params.target} failed`)
    throw err
  }
  spinner.succeed(`Resolved licenses for ${params.target}`)

  const prefix = params.outputPrefix ?? outputPrefixForTarget(params.target)
  const bomPath = path.join(params.outputDir, `${prefix}${BOM_FILE_SUFFIX}`)
  const issuesPath = path.join(
    params.outputDir,
    `${prefix}${BOM_ISSUES_FILE_SUFFIX}`,
  )

  const lists = { approved, denied }
  await fs.mkdir(params.outputDir, { recursive: true })
  await writeBom(bomPath, createBomDocument(result.manifest, lists))
  await writeBom(issuesPath, createIssuesDocument(result.issues, lists))

  if (result.denied.length > 0) {
    process.stderr.write(
      formatDeniedAlert(result.denied, bomPath, params.deniedListPath),
    )
  }

  const summary: AuditSummary = {
    target: params.target,
    packages: result.manifest.length,
    denied: result.issues.filter(issue => issue.reason === 'Denied').length,
    unapproved: result.issues.filter(issue => issue.reason === 'Unapproved')
      .length,
    licenseFailures: result.licenseFailures.length,
    verdict: result.verdict,
    bomPath,
    issuesPath,
  }
  return { result, summary }
}

export const auditCommand: CommandModule<{}, AuditArgs> = {
  command: 'audit',
  describe: 'Audit the dependency closure of a build target and write its BOM',
  builder: yargs => {
    return yargs
      .option('graph', {
        describe: 'Path to the build graph JSON export',
        type: 'string',
        demandOption: true,
      })
      .option('target', {
        alias: 't',
        describe: 'Label of the target to audit (e.g., //app:server)',
        type: 'string',
        demandOption: true,
      })
      .option('approved-list', {
        describe: 'YAML or text file of approved packages',
        type: 'string',
      })
      .option('denied-list', {
        describe: 'YAML or text file of denied packages',
        type: 'string',
      })
      .option('suppress', {
        describe: 'Denied package to ignore for this run (repeatable)',
        type: 'string',
        array: true,
        default: [],
      })
      .option('strict', {
        describe: 'Fail when denied packages are used (or OSS_AUDIT_STRICT=1)',
        type: 'boolean',
        default: false,
      })
      .option('debug', {
        describe: 'Log internal and environment packages',
        type: 'boolean',
        default: false,
      })
      .option('concurrency', {
        describe: 'Maximum parallel license lookups',
        type: 'number',
      })
      .option('output-dir', {
        alias: 'o',
        describe: 'Directory for the BOM files',
        type: 'string',
        default: process.cwd(),
      })
      .option('output-prefix', {
        describe: 'File name prefix for the BOM files (default: target name)',
        type: 'string',
      })
      .option('json', {
        describe: 'Output the summary as JSON',
        type: 'boolean',
        default: false,
      })
      .example(
        '$0 audit --graph graph.json --target //app:server',
        'Write server.bom.yaml and server.bom-issues.yaml',
      )
      .example(
        '$0 audit --graph graph.json -t //app:server --denied-list denied.yaml --strict',
        'Fail when a denied package is used',
      )
  },
  handler: async argv => {
    try {
      const config = getAuditConfigFromEnv()
      const debugEnabled = argv.debug || config.debug
      if (debugEnabled) {
        process.env['OSS_AUDIT_DEBUG'] = '1'
      }

      const { result, summary } = await performAudit({
        graphPath: argv.graph,
        target: argv.target,
        approvedListPath: argv['approved-list'],
        deniedListPath: argv['denied-list'],
        suppress: argv.suppress,
        strict: argv.strict || config.strict,
        debug: debugEnabled,
        concurrency: argv.concurrency ?? config.concurrency,
        outputDir: argv['output-dir'],
        outputPrefix: argv['output-prefix'],
        retryDelayMs: config.retryDelayMs,
        silent: argv.json,
      })

      if (argv.json) {
        console.log(
          JSON.stringify(
            {
              ...summary,
              deniedPackages: result.denied,
              unsuppressedDenied: result.unsuppressedDenied,
              warnings: result.warnings.map(w => w.message),
              failedLookups: result.licenseFailures,
            },
            null,
            2,
          ),
        )
      } else {
        console.log(formatAuditSummary(summary))
      }
      process.exit(summary.verdict === 'pass' ? 0 : 1)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      if (argv.json) {
        console.log(JSON.stringify({ error: errorMessage }, null, 2))
      } else {
        console.error(`Error: ${errorMessage}`)
      }
      process.exit(1)
    }
  },
}
