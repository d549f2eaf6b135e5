import type { AuditSummary } from './types.js'

const PREFIX = '[oss-audit]'

/**
 * Check if debug mode is enabled.
 */
export function isDebugEnabled(): boolean {
  return (
    process.env['OSS_AUDIT_DEBUG'] === '1' ||
    process.env['OSS_AUDIT_DEBUG'] === 'true'
  )
}

// All logging goes to stderr; stdout carries command output only.

export function log(message: string, verbose: boolean = false): void {
  if (verbose) {
    console.error(`${PREFIX} ${message}`)
  }
}

export function debug(message: string, ...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.error(`${PREFIX} DEBUG: ${message}`, ...args)
  }
}

export function warn(message: string): void {
  console.error(`${PREFIX} WARNING: ${message}`)
}

export function error(message: string): void {
  console.error(`${PREFIX} ERROR: ${message}`)
}

export function formatAuditSummary(summary: AuditSummary): string {
  const lines = [
    `Audited ${summary.packages} package(s) for ${summary.target}`,
    `  BOM: ${summary.bomPath}`,
    `  BOM issues: ${summary.issuesPath}`,
  ]
  if (summary.denied > 0 || summary.unapproved > 0) {
    lines.push(
      `  Issues: ${summary.denied} denied, ${summary.unapproved} unapproved`,
    )
  } else {
    lines.push('  No issues found')
  }
  if (summary.licenseFailures > 0) {
    lines.push(`  License lookup failed for ${summary.licenseFailures} artifact(s)`)
  }
  lines.push(
    summary.verdict === 'pass'
      ? '✓ Audit passed'
      : '✗ Audit failed: denied packages are used in strict mode',
  )
  return lines.join('\n')
}
