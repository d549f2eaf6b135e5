import { z } from 'zod'

/**
 * Settings an audit run takes from the environment when no flag is given.
 */
export interface AuditConfig {
  strict: boolean
  debug: boolean
  /** License lookup pool size; unset means the default */
  concurrency?: number
  /** Wait between lookup retries */
  retryDelayMs?: number
}

const ConcurrencySchema = z.coerce.number().int().min(1)
const RetryDelaySchema = z.coerce.number().int().min(0)

function isFlagSet(value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

function parseNumber(
  name: string,
  value: string | undefined,
  schema: z.ZodNumber,
): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new Error(
      `Invalid ${name}: ${value} (${result.error.issues[0]?.message ?? 'not a number'})`,
    )
  }
  return result.data
}

/**
 * Read audit settings from environment variables.
 *
 * Environment variables:
 * - OSS_AUDIT_STRICT: fail on denied packages (1 or true)
 * - OSS_AUDIT_DEBUG: debug logging (1 or true)
 * - OSS_AUDIT_CONCURRENCY: license lookup pool size
 * - OSS_AUDIT_RETRY_DELAY_MS: wait between license lookup retries
 */
export function getAuditConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AuditConfig {
  return {
    strict: isFlagSet(env['OSS_AUDIT_STRICT']),
    debug: isFlagSet(env['OSS_AUDIT_DEBUG']),
    concurrency: parseNumber(
      'OSS_AUDIT_CONCURRENCY',
      env['OSS_AUDIT_CONCURRENCY'],
      ConcurrencySchema,
    ),
    retryDelayMs: parseNumber(
      'OSS_AUDIT_RETRY_DELAY_MS',
      env['OSS_AUDIT_RETRY_DELAY_MS'],
      RetryDelaySchema,
    ),
  }
}
