import * as os from 'os'
import { MAX_DEFAULT_CONCURRENCY } from '../constants.js'
import {
  LicenseLookupError,
  LicenseResolutionAbortedError,
} from '../errors.js'
import { debug } from '../utils.js'
import type { LicenseOutcome, LicenseResolver } from './types.js'

export interface ResolveLicensesOptions {
  /** Maximum number of lookups in flight (default: CPU count, at most 8) */
  concurrency?: number
  onProgress?: (jarUrl: string, done: number, total: number) => void
}

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(os.availableParallelism(), MAX_DEFAULT_CONCURRENCY))
}

/**
 * Resolve the license of every distinct artifact URL with a bounded pool of
 * workers.
 *
 * Each URL reaches the resolver at most once. A LicenseLookupError only
 * affects its own URL. Any other error stops the pool: queued URLs are not
 * started, in-flight lookups see an aborted signal, and the call rejects
 * once every worker has returned.
 *
 * @returns outcome per URL, available only after all lookups have settled
 * @throws LicenseResolutionAbortedError
 */
export async function resolveLicenses(
  jarUrls: Iterable<string>,
  resolver: LicenseResolver,
  options: ResolveLicensesOptions = {},
): Promise<Map<string, LicenseOutcome>> {
  const urls = Array.from(new Set(jarUrls)).filter(url => url !== '')
  const total = urls.length
  if (total === 0) {
    return new Map()
  }

  const concurrency = Math.min(options.concurrency ?? defaultConcurrency(), total)
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Invalid concurrency: ${options.concurrency}`)
  }

  const controller = new AbortController()
  let cursor = 0
  let done = 0

  const worker = async (): Promise<Array<[string, LicenseOutcome]>> => {
    const outcomes: Array<[string, LicenseOutcome]> = []
    while (!controller.signal.aborted && cursor < total) {
      const url = urls[cursor++]
      try {
        const license = await resolver.resolve(url, controller.signal)
        outcomes.push([url, { ok: true, license }])
      } catch (err) {
        if (!(err instanceof LicenseLookupError)) {
          controller.abort(err)
          throw err
        }
        debug(`License lookup failed for ${url}: ${err.message}`)
        outcomes.push([url, { ok: false, error: err }])
      }
      done++
      options.onProgress?.(url, done, total)
    }
    return outcomes
  }

  const settled = await Promise.allSettled(
    Array.from({ length: concurrency }, () => worker()),
  )

  if (controller.signal.aborted) {
    throw new LicenseResolutionAbortedError(controller.signal.reason)
  }

  const results = new Map<string, LicenseOutcome>()
  for (const workerResult of settled) {
    if (workerResult.status === 'fulfilled') {
      for (const [url, outcome] of workerResult.value) {
        results.set(url, outcome)
      }
    }
  }
  return results
}
