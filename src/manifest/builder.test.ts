import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { buildManifest, failedLookups, isInternalPackage } from './builder.js'
import { parseCoordinate } from '../coordinate/coordinate.js'
import { LicenseLookupError } from '../errors.js'
import type { LicenseOutcome } from '../license/types.js'
import type { CollectedPackage } from '../types.js'

const URL_A = 'https://repo.example.com/a-1.0.jar'
const URL_B = 'https://repo.example.com/b-2.0.jar'
const URL_C = 'https://repo.example.com/c-3.0.jar'

function pkg(coordinate: string, jarUrl: string): CollectedPackage {
  return { coordinate, ...parseCoordinate(coordinate), jarUrl }
}

function licensed(license: string): LicenseOutcome {
  return { ok: true, license }
}

describe('buildManifest', () => {
  it('should attach licenses by artifact URL', () => {
    const { manifest } = buildManifest(
      [pkg('org.example:a:1.0', URL_A)],
      new Map([[URL_A, licensed('Apache-2.0')]]),
    )

    assert.deepEqual(manifest, [
      {
        coordinate: 'org.example:a:1.0',
        group: 'org.example',
        artifact: 'a',
        version: '1.0',
        jarUrl: URL_A,
        license: 'Apache-2.0',
        modified: false,
      },
    ])
  })

  it('should share a license between coordinates with the same URL', () => {
    const { manifest } = buildManifest(
      [pkg('org.example:a:1.0', URL_A), pkg('org.example:alias:1.0', URL_A)],
      new Map([[URL_A, licensed('MIT')]]),
    )
    assert.deepEqual(manifest.map(r => r.license), ['MIT', 'MIT'])
  })

  it('should keep packages whose lookup failed with an empty license', () => {
    const { manifest } = buildManifest(
      [pkg('org.example:a:1.0', URL_A), pkg('org.example:b:2.0', URL_B)],
      new Map<string, LicenseOutcome>([
        [URL_A, licensed('Apache-2.0')],
        [URL_B, { ok: false, error: new LicenseLookupError(URL_B, 'Not found') }],
      ]),
    )

    assert.deepEqual(
      manifest.map(r => [r.coordinate, r.license]),
      [
        ['org.example:a:1.0', 'Apache-2.0'],
        ['org.example:b:2.0', ''],
      ],
    )
  })

  it('should keep packages that were never resolved', () => {
    const { manifest } = buildManifest([pkg('org.example:c:3.0', URL_C)], new Map())
    assert.equal(manifest.length, 1)
    assert.equal(manifest[0].license, '')
  })

  it('should leave internal packages out of the manifest', () => {
    const internalPkg = pkg('com.corp:internal:0.1', '')
    const { manifest, internal } = buildManifest(
      [pkg('org.example:a:1.0', URL_A), internalPkg],
      new Map([[URL_A, licensed('MIT')]]),
    )

    assert.deepEqual(manifest.map(r => r.coordinate), ['org.example:a:1.0'])
    assert.deepEqual(internal, [internalPkg])
    assert.equal(isInternalPackage(internalPkg), true)
  })

  it('should sort the manifest regardless of input order', () => {
    const licenses = new Map<string, LicenseOutcome>()
    const first = buildManifest(
      [pkg('org.example:c:3.0', URL_C), pkg('org.example:a:1.0', URL_A), pkg('org.example:b:2.0', URL_B)],
      licenses,
    )
    const second = buildManifest(
      [pkg('org.example:b:2.0', URL_B), pkg('org.example:c:3.0', URL_C), pkg('org.example:a:1.0', URL_A)],
      licenses,
    )

    assert.deepEqual(first, second)
    assert.deepEqual(
      first.manifest.map(r => r.coordinate),
      ['org.example:a:1.0', 'org.example:b:2.0', 'org.example:c:3.0'],
    )
  })

  it('should not duplicate a package listed twice', () => {
    const { manifest } = buildManifest(
      [pkg('org.example:a:1.0', URL_A), pkg('org.example:a:1.0', URL_A)],
      new Map(),
    )
    assert.equal(manifest.length, 1)
  })
})

describe('failedLookups', () => {
  it('should list failed URLs in order', () => {
    const licenses = new Map<string, LicenseOutcome>([
      [URL_C, { ok: false, error: new LicenseLookupError(URL_C, 'Not found') }],
      [URL_A, licensed('MIT')],
      [URL_B, { ok: false, error: new LicenseLookupError(URL_B, 'Not found') }],
    ])
    assert.deepEqual(failedLookups(licenses), [URL_B, URL_C])
  })
})
