import { collectClosure } from '../graph/collector.js'
import type { BuildGraph } from '../graph/types.js'
import { resolveLicenses, type ResolveLicensesOptions } from '../license/resolve-all.js'
import type { LicenseResolver } from '../license/types.js'
import { buildManifest, failedLookups } from '../manifest/builder.js'
import { evaluatePolicy } from '../policy/evaluator.js'
import type { PolicyList } from '../policy/policy-list.js'
import type {
  AuditWarning,
  CollectedPackage,
  PackageRecord,
  PolicyIssue,
  Verdict,
} from '../types.js'
import { log, warn } from '../utils.js'

export interface AuditOptions {
  resolver: LicenseResolver
  approved?: PolicyList
  denied?: PolicyList
  /** Denied coordinates exempted for this run */
  suppress?: PolicyList | ReadonlyArray<string>
  strict?: boolean
  /** Log internal packages. Never changes the result. */
  debug?: boolean
  concurrency?: number
  onProgress?: ResolveLicensesOptions['onProgress']
}

export interface AuditResult {
  target: string
  manifest: ReadonlyArray<PackageRecord>
  issues: ReadonlyArray<PolicyIssue>
  verdict: Verdict
  /** Denied coordinates in the manifest, suppressed or not */
  denied: ReadonlyArray<string>
  unsuppressedDenied: ReadonlyArray<string>
  /** Packages supplied by the deployment environment; not audited */
  environment: ReadonlyArray<CollectedPackage>
  /** Packages without an artifact URL; not audited */
  internal: ReadonlyArray<CollectedPackage>
  warnings: ReadonlyArray<AuditWarning>
  /** Artifact URLs whose license lookup failed */
  licenseFailures: ReadonlyArray<string>
}

/**
 * Audit the dependency closure of a build target: collect packages, resolve
 * their licenses, build the manifest and classify it against the policy
 * lists.
 *
 * @throws GraphError on a structurally invalid graph
 * @throws LicenseResolutionAbortedError when the resolver fails fatally
 */
export async function auditTarget(
  graph: BuildGraph,
  target: string,
  options: AuditOptions,
): Promise<AuditResult> {
  const verbose = options.debug === true

  const collected = collectClosure(graph, target)
  log(`Collected ${collected.closure.length} package(s) for ${target}`, verbose)

  const licenses = await resolveLicenses(
    collected.closure.map(pkg => pkg.jarUrl),
    options.resolver,
    { concurrency: options.concurrency, onProgress: options.onProgress },
  )

  const { manifest, internal } = buildManifest(collected.closure, licenses)
  for (const pkg of internal) {
    log(`Internal package (not audited): ${pkg.coordinate}`, verbose)
  }
  for (const pkg of collected.environment) {
    log(`Environment package (not audited): ${pkg.coordinate}`, verbose)
  }

  const evaluation = evaluatePolicy(manifest, {
    approved: options.approved,
    denied: options.denied,
    suppress: options.suppress,
    strict: options.strict,
  })

  const warnings: AuditWarning[] = collected.warnings.map(
    (w): AuditWarning => ({
      source: 'graph',
      message: `${w.node}: ${w.message}`,
    }),
  )
  for (const coordinate of evaluation.conflicts) {
    const message = `${coordinate} is on both the approved and the denied list; treating it as denied`
    warn(message)
    warnings.push({ source: 'policy', message })
  }

  return {
    target,
    manifest,
    issues: evaluation.issues,
    verdict: evaluation.verdict,
    denied: evaluation.denied,
    unsuppressedDenied: evaluation.unsuppressedDenied,
    environment: collected.environment,
    internal,
    warnings,
    licenseFailures: failedLookups(licenses),
  }
}
