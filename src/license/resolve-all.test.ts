import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { resolveLicenses } from './resolve-all.js'
import { FakeLicenseResolver } from '../test-utils.js'
import {
  LicenseLookupError,
  LicenseResolutionAbortedError,
} from '../errors.js'

const URL_A = 'https://repo.example.com/a-1.0.jar'
const URL_B = 'https://repo.example.com/b-2.0.jar'
const URL_C = 'https://repo.example.com/c-3.0.jar'

describe('resolveLicenses', () => {
  it('should resolve every URL', async () => {
    const resolver = new FakeLicenseResolver({
      [URL_A]: 'Apache-2.0',
      [URL_B]: 'MIT',
    })

    const results = await resolveLicenses([URL_A, URL_B], resolver)

    assert.deepEqual(results.get(URL_A), { ok: true, license: 'Apache-2.0' })
    assert.deepEqual(results.get(URL_B), { ok: true, license: 'MIT' })
  })

  it('should call the resolver once per distinct URL', async () => {
    const resolver = new FakeLicenseResolver({ [URL_A]: 'Apache-2.0' })

    const results = await resolveLicenses(
      [URL_A, URL_B, URL_A, URL_A, URL_B],
      resolver,
      { concurrency: 4 },
    )

    assert.deepEqual([...resolver.calls].sort(), [URL_A, URL_B])
    assert.equal(results.size, 2)
  })

  it('should skip empty URLs', async () => {
    const resolver = new FakeLicenseResolver()
    const results = await resolveLicenses(['', URL_A], resolver)
    assert.deepEqual(resolver.calls, [URL_A])
    assert.equal(results.has(''), false)
  })

  it('should return an empty map without calling the resolver', async () => {
    const resolver = new FakeLicenseResolver()
    const results = await resolveLicenses([], resolver)
    assert.equal(results.size, 0)
    assert.equal(resolver.calls.length, 0)
  })

  it('should isolate lookup failures to their own URL', async () => {
    const resolver = new FakeLicenseResolver(
      { [URL_A]: 'Apache-2.0', [URL_C]: 'MIT' },
      { missing: [URL_B] },
    )

    const results = await resolveLicenses([URL_A, URL_B, URL_C], resolver, {
      concurrency: 1,
    })

    assert.deepEqual(results.get(URL_A), { ok: true, license: 'Apache-2.0' })
    assert.deepEqual(results.get(URL_C), { ok: true, license: 'MIT' })
    const failed = results.get(URL_B)
    assert.ok(failed && !failed.ok)
    assert.ok(failed.error instanceof LicenseLookupError)
    assert.equal(failed.error.message, `Not found: ${URL_B}`)
  })

  it('should never exceed the concurrency bound', async () => {
    const urls = Array.from({ length: 12 }, (_, i) => `https://repo.example.com/p${i}.jar`)
    const resolver = new FakeLicenseResolver({}, { delayMs: 5 })

    const results = await resolveLicenses(urls, resolver, { concurrency: 3 })

    assert.equal(results.size, 12)
    assert.equal(resolver.maxInFlight, 3)
  })

  it('should report progress for each URL', async () => {
    const resolver = new FakeLicenseResolver()
    const progress: number[] = []

    await resolveLicenses([URL_A, URL_B, URL_C], resolver, {
      concurrency: 2,
      onProgress: (_url, done, total) => {
        assert.equal(total, 3)
        progress.push(done)
      },
    })

    assert.deepEqual(progress, [1, 2, 3])
  })

  it('should abort the run on a non-lookup error and stop queued work', async () => {
    const resolver = new FakeLicenseResolver({}, { broken: [URL_A] })

    await assert.rejects(
      resolveLicenses([URL_A, URL_B, URL_C], resolver, { concurrency: 1 }),
      (err: unknown) => {
        assert.ok(err instanceof LicenseResolutionAbortedError)
        assert.ok(err.cause instanceof TypeError)
        assert.equal(
          err.message,
          `License resolution aborted: Resolver bug for ${URL_A}`,
        )
        return true
      },
    )
    assert.deepEqual(resolver.calls, [URL_A])
  })

  it('should reject a concurrency below one', async () => {
    const resolver = new FakeLicenseResolver()
    await assert.rejects(
      resolveLicenses([URL_A], resolver, { concurrency: 0 }),
      RangeError,
    )
  })
})
