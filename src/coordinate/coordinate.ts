import { CoordinateError } from '../errors.js'
import type { CollectedPackage } from '../types.js'

export interface PackageCoordinate {
  group: string
  artifact: string
  version: string
}

const MAVEN_ECOSYSTEM_PREFIX = 'maven:'

/**
 * Parse a "group:artifact:version" string.
 * The version is everything after the last colon; the group is everything
 * before the first. Anything in between belongs to the artifact.
 * e.g., "g:a:jar:1.0" -> { group: "g", artifact: "a:jar", version: "1.0" }
 *
 * @throws CoordinateError when the string has fewer than two colons
 */
export function parseCoordinate(coordinate: string): PackageCoordinate {
  const versionSep = coordinate.lastIndexOf(':')
  if (versionSep === -1) {
    throw new CoordinateError(coordinate)
  }
  const name = coordinate.slice(0, versionSep)
  const groupSep = name.indexOf(':')
  if (groupSep === -1) {
    throw new CoordinateError(coordinate)
  }
  return {
    group: name.slice(0, groupSep),
    artifact: name.slice(groupSep + 1),
    version: coordinate.slice(versionSep + 1),
  }
}

export function formatCoordinate(coordinate: PackageCoordinate): string {
  return `${coordinate.group}:${coordinate.artifact}:${coordinate.version}`
}

/**
 * "group:artifact", the coordinate without its version.
 */
export function packageName(coordinate: PackageCoordinate): string {
  return `${coordinate.group}:${coordinate.artifact}`
}

/**
 * Normalize a policy list entry: trims it and drops a "maven:" ecosystem
 * prefix from full coordinates ("maven:wsdl4j:wsdl4j:1.6.2").
 */
export function normalizePolicyEntry(entry: string): string {
  const trimmed = entry.trim()
  if (
    trimmed.startsWith(MAVEN_ECOSYSTEM_PREFIX) &&
    trimmed.split(':').length >= 4
  ) {
    return trimmed.slice(MAVEN_ECOSYSTEM_PREFIX.length)
  }
  return trimmed
}

/**
 * Check whether a policy entry covers a coordinate, either exactly or as a
 * prefix ending on a segment boundary.
 */
export function entryMatches(entry: string, coordinate: string): boolean {
  if (entry === '') return false
  return entry === coordinate || coordinate.startsWith(`${entry}:`)
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Total order over packages: coordinate, then artifact URL, then source URL.
 */
export function comparePackages(
  a: CollectedPackage,
  b: CollectedPackage,
): number {
  return (
    compareStrings(a.coordinate, b.coordinate) ||
    compareStrings(a.jarUrl, b.jarUrl) ||
    compareStrings(a.sourceUrl ?? '', b.sourceUrl ?? '')
  )
}

/**
 * Identity of a package in the closure. Identical coordinates fetched from
 * different locations are distinct packages.
 */
export function packageKey(pkg: CollectedPackage): string {
  return [pkg.coordinate, pkg.jarUrl, pkg.sourceUrl ?? ''].join('\u0000')
}
