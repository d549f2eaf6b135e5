import type { PackageRecord, PolicyIssue, Verdict } from '../types.js'
import { PolicyList } from './policy-list.js'

export interface PolicyOptions {
  /** Absent lists are treated as empty */
  approved?: PolicyList
  denied?: PolicyList
  /** Denied coordinates exempted for this run */
  suppress?: PolicyList | ReadonlyArray<string>
  /** Fail the run when a denied package is used */
  strict?: boolean
}

export interface PolicyEvaluation {
  /** Denied and unapproved packages, in manifest order */
  issues: ReadonlyArray<PolicyIssue>
  verdict: Verdict
  /** Coordinates on the denied list, suppressed or not */
  denied: ReadonlyArray<string>
  /** Coordinates on the denied list and not suppressed */
  unsuppressedDenied: ReadonlyArray<string>
  /** Coordinates found on both the approved and the denied list */
  conflicts: ReadonlyArray<string>
}

/**
 * Classify manifest entries against the approved and denied lists.
 *
 * The denied list is checked first and wins over the approved list.
 * A suppressed denial produces no issue. Anything on neither list is
 * Unapproved. Only unsuppressed denials in strict mode fail the run.
 */
export function evaluatePolicy(
  manifest: ReadonlyArray<PackageRecord>,
  options: PolicyOptions = {},
): PolicyEvaluation {
  const approved = options.approved ?? PolicyList.empty()
  const denied = options.denied ?? PolicyList.empty()
  const suppress =
    options.suppress instanceof PolicyList
      ? options.suppress
      : PolicyList.from(options.suppress ?? [])

  const issues: PolicyIssue[] = []
  const deniedCoordinates = new Set<string>()
  const unsuppressed = new Set<string>()
  const conflicts = new Set<string>()

  for (const record of manifest) {
    const isApproved = approved.matches(record.coordinate)

    if (denied.matches(record.coordinate)) {
      deniedCoordinates.add(record.coordinate)
      if (isApproved) {
        conflicts.add(record.coordinate)
      }
      if (!suppress.matches(record.coordinate)) {
        unsuppressed.add(record.coordinate)
        issues.push({ record, reason: 'Denied' })
      }
    } else if (!isApproved) {
      issues.push({ record, reason: 'Unapproved' })
    }
  }

  const strictFailure = options.strict === true && unsuppressed.size > 0

  return {
    issues,
    verdict: strictFailure ? 'fail' : 'pass',
    denied: Array.from(deniedCoordinates),
    unsuppressedDenied: Array.from(unsuppressed),
    conflicts: Array.from(conflicts),
  }
}
