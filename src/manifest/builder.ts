import { comparePackages, packageKey } from '../coordinate/coordinate.js'
import type { LicenseOutcome } from '../license/types.js'
import type { CollectedPackage, PackageRecord } from '../types.js'

export interface BuildManifestResult {
  /** External packages with their licenses, in canonical order */
  manifest: ReadonlyArray<PackageRecord>
  /** Internal packages (no artifact URL), left out of the manifest */
  internal: ReadonlyArray<CollectedPackage>
}

/**
 * Check whether a package is built in-house rather than fetched from a
 * repository
 */
export function isInternalPackage(pkg: CollectedPackage): boolean {
  return pkg.jarUrl === ''
}

/**
 * Join collected packages with their resolved licenses.
 *
 * Every external package appears exactly once. A package whose lookup failed
 * or never ran gets an empty license instead of being dropped.
 */
export function buildManifest(
  closure: ReadonlyArray<CollectedPackage>,
  licenses: ReadonlyMap<string, LicenseOutcome>,
): BuildManifestResult {
  const external = new Map<string, PackageRecord>()
  const internal = new Map<string, CollectedPackage>()

  for (const pkg of closure) {
    const key = packageKey(pkg)
    if (isInternalPackage(pkg)) {
      internal.set(key, pkg)
      continue
    }
    if (external.has(key)) continue

    const outcome = licenses.get(pkg.jarUrl)
    external.set(key, {
      ...pkg,
      license: outcome?.ok ? outcome.license : '',
      modified: false,
    })
  }

  return {
    manifest: Array.from(external.values()).sort(comparePackages),
    internal: Array.from(internal.values()).sort(comparePackages),
  }
}

/**
 * Artifact URLs whose license lookup failed
 */
export function failedLookups(
  licenses: ReadonlyMap<string, LicenseOutcome>,
): string[] {
  const failed: string[] = []
  for (const [url, outcome] of licenses) {
    if (!outcome.ok) failed.push(url)
  }
  return failed.sort()
}
