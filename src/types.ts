/**
 * A package identity collected from the build graph, before license data is
 * attached.
 */
export interface CollectedPackage {
  /** Full coordinate string, e.g. com.google.guava:guava:31.1-jre */
  readonly coordinate: string
  readonly group: string
  readonly artifact: string
  readonly version: string
  /** Download location of the artifact; empty for internal packages */
  readonly jarUrl: string
  /** Download location of the source archive, when known */
  readonly sourceUrl?: string
}

/**
 * A collected package enriched with its license, as it appears in the BOM.
 */
export interface PackageRecord extends CollectedPackage {
  /** License names; empty when lookup failed or found nothing */
  readonly license: string
  readonly modified: boolean
}

export type IssueReason = 'Denied' | 'Unapproved'

export interface PolicyIssue {
  readonly record: PackageRecord
  readonly reason: IssueReason
}

export type Verdict = 'pass' | 'fail'

export interface AuditWarning {
  readonly source: 'graph' | 'policy'
  readonly message: string
}

export interface AuditSummary {
  target: string
  packages: number
  denied: number
  unapproved: number
  licenseFailures: number
  verdict: Verdict
  bomPath: string
  issuesPath: string
}
