import type { LicenseLookupError } from '../errors.js'

/**
 * Capability that finds the license of a published artifact.
 *
 * Implementations resolve to the license text (possibly empty) and reject
 * with LicenseLookupError when the lookup itself fails. Any other rejection
 * aborts the audit.
 */
export interface LicenseResolver {
  resolve(jarUrl: string, signal?: AbortSignal): Promise<string>
}

export type LicenseOutcome =
  | { readonly ok: true; readonly license: string }
  | { readonly ok: false; readonly error: LicenseLookupError }
