/**
 * A coordinate string that cannot be split into group, artifact and version.
 */
export class CoordinateError extends Error {
  readonly coordinate: string

  constructor(coordinate: string) {
    super(
      `Malformed coordinate "${coordinate}": expected group:artifact:version`,
    )
    this.name = 'CoordinateError'
    this.coordinate = coordinate
  }
}

/**
 * The build graph is structurally invalid. Fatal for the run.
 */
export class GraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GraphError'
  }
}

/**
 * An approved or denied list could not be read or has an unexpected shape.
 * Fatal for the run.
 */
export class PolicyListError extends Error {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid policy list ${path}: ${message}`, options)
    this.name = 'PolicyListError'
    this.path = path
  }
}

/**
 * License lookup failed for a single artifact. Absorbed by the audit as an
 * empty license on that one entry.
 */
export class LicenseLookupError extends Error {
  readonly jarUrl: string

  constructor(jarUrl: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LicenseLookupError'
    this.jarUrl = jarUrl
  }
}

/**
 * A resolver failed with something other than a lookup failure and the
 * remaining lookups were cancelled.
 */
export class LicenseResolutionAbortedError extends Error {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`License resolution aborted: ${reason}`, { cause })
    this.name = 'LicenseResolutionAbortedError'
  }
}
