import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import * as http from 'node:http'
import * as fs from 'fs/promises'
import * as path from 'path'
import { pathToFileURL } from 'url'
import {
  PomLicenseResolver,
  parsePomLicenses,
  pomUrlForJar,
} from './pom-resolver.js'
import { LicenseLookupError } from '../errors.js'
import { createTestDir, removeTestDir, writeTestPom } from '../test-utils.js'

const APACHE = 'The Apache Software License, Version 2.0'

const POM_XML = `<?xml version="1.0" encoding="UTF-8"?>
<project xmlns="http://maven.apache.org/POM/4.0.0">
  <licenses>
    <license>
      <name>${APACHE}</name>
      <distribution>repo</distribution>
    </license>
  </licenses>
</project>`

describe('pom-resolver', () => {
  describe('pomUrlForJar', () => {
    it('should swap the .jar extension for .pom', () => {
      assert.equal(
        pomUrlForJar('https://repo.example.com/g/jsr305/3.0.2/jsr305-3.0.2.jar'),
        'https://repo.example.com/g/jsr305/3.0.2/jsr305-3.0.2.pom',
      )
    })

    it('should only replace the trailing extension', () => {
      assert.equal(
        pomUrlForJar('https://repo.example.com/g/jarjar/1.0/jarjar-1.0.jar'),
        'https://repo.example.com/g/jarjar/1.0/jarjar-1.0.pom',
      )
    })

    it('should reject URLs that are not jars', () => {
      assert.throws(
        () => pomUrlForJar('https://repo.example.com/g/a/1.0/a-1.0.zip'),
        LicenseLookupError,
      )
    })
  })

  describe('parsePomLicenses', () => {
    it('should read license names from a namespaced POM', async () => {
      assert.deepEqual(await parsePomLicenses(POM_XML), [APACHE])
    })

    it('should read several licenses in document order', async () => {
      const xml = `<project>
        <licenses>
          <license><name>EPL-2.0</name></license>
          <license><name> GPL-2.0 with Classpath Exception </name></license>
        </licenses>
      </project>`
      assert.deepEqual(await parsePomLicenses(xml), [
        'EPL-2.0',
        'GPL-2.0 with Classpath Exception',
      ])
    })

    it('should ignore namespace prefixes on tags', async () => {
      const xml = `<pom:project xmlns:pom="http://maven.apache.org/POM/4.0.0">
        <pom:licenses><pom:license><pom:name>MIT</pom:name></pom:license></pom:licenses>
      </pom:project>`
      assert.deepEqual(await parsePomLicenses(xml), ['MIT'])
    })

    it('should return no names when the POM has no licenses', async () => {
      const xml = '<project><modelVersion>4.0.0</modelVersion></project>'
      assert.deepEqual(await parsePomLicenses(xml), [])
    })

    it('should return no names for empty licenses elements', async () => {
      const xml = '<project><licenses>\n  </licenses></project>'
      assert.deepEqual(await parsePomLicenses(xml), [])
    })

    it('should reject documents that are not POMs', async () => {
      await assert.rejects(parsePomLicenses('<settings></settings>'))
    })
  })

  describe('PomLicenseResolver with file URLs', () => {
    let testDir: string

    before(async () => {
      testDir = await createTestDir('pom-resolver-')
    })

    after(async () => {
      await removeTestDir(testDir)
    })

    it('should join license names with a semicolon', async () => {
      const jarUrl = await writeTestPom(testDir, 'dual-1.0', ['Apache-2.0', 'MIT'], {
        namespace: true,
      })
      const resolver = new PomLicenseResolver()
      assert.equal(await resolver.resolve(jarUrl), 'Apache-2.0;MIT')
    })

    it('should resolve to an empty string when no license is declared', async () => {
      const jarUrl = await writeTestPom(testDir, 'bare-1.0', [])
      const resolver = new PomLicenseResolver()
      assert.equal(await resolver.resolve(jarUrl), '')
    })

    it('should fail with a lookup error when the POM is missing', async () => {
      const jarUrl = pathToFileURL(path.join(testDir, 'missing-1.0.jar')).href
      const resolver = new PomLicenseResolver()
      await assert.rejects(resolver.resolve(jarUrl), (err: unknown) => {
        assert.ok(err instanceof LicenseLookupError)
        assert.equal(err.jarUrl, jarUrl)
        assert.match(err.message, /^Unable to read \.pom from file:/)
        return true
      })
    })

    it('should fail with a lookup error on malformed XML', async () => {
      const jarUrl = await writeTestPom(testDir, 'ok-1.0', ['MIT'])
      const brokenUrl = jarUrl.replace('ok-1.0.jar', 'broken-1.0.jar')
      await fs.writeFile(path.join(testDir, 'broken-1.0.pom'), '<project><licenses>', 'utf-8')

      const resolver = new PomLicenseResolver()
      await assert.rejects(resolver.resolve(brokenUrl), (err: unknown) => {
        assert.ok(err instanceof LicenseLookupError)
        assert.match(err.message, /^Unable to parse \.pom from /)
        return true
      })
    })

    it('should fail with a lookup error on an unsupported protocol', async () => {
      const resolver = new PomLicenseResolver()
      await assert.rejects(resolver.resolve('ftp://repo.example.com/a-1.0.jar'), {
        name: 'LicenseLookupError',
        message: 'Unsupported protocol ftp: in ftp://repo.example.com/a-1.0.jar',
      })
    })

    it('should fail with a lookup error on an unparseable URL', async () => {
      const resolver = new PomLicenseResolver()
      await assert.rejects(resolver.resolve('not a url.jar'), {
        name: 'LicenseLookupError',
        message: 'Invalid artifact URL: not a url.jar',
      })
    })
  })

  describe('PomLicenseResolver over HTTP', () => {
    let server: http.Server
    let baseUrl: string
    const requests: string[] = []
    // Status codes served, in order, per path before the POM itself
    const failures = new Map<string, number[]>()

    before(async () => {
      server = http.createServer((req, res) => {
        const url = req.url ?? ''
        requests.push(url)
        const queued = failures.get(url)
        const status = queued?.shift()
        if (status !== undefined) {
          res.writeHead(status)
          res.end()
          return
        }
        if (url === '/moved/lib-1.0.pom') {
          res.writeHead(302, { Location: '/lib/lib-1.0.pom' })
          res.end()
          return
        }
        if (url.startsWith('/lib/')) {
          res.writeHead(200, { 'Content-Type': 'application/xml' })
          res.end(POM_XML)
          return
        }
        res.writeHead(404)
        res.end()
      })
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve))
      const address = server.address()
      assert.ok(address !== null && typeof address === 'object')
      baseUrl = `http://127.0.0.1:${address.port}`
    })

    after(async () => {
      await new Promise<void>(resolve => server.close(() => resolve()))
    })

    it('should download and parse the POM', async () => {
      const resolver = new PomLicenseResolver({ retryDelayMs: 1 })
      assert.equal(await resolver.resolve(`${baseUrl}/lib/lib-1.0.jar`), APACHE)
    })

    it('should retry on retryable status codes', async () => {
      failures.set('/lib/retry-1.0.pom', [503, 429])
      requests.length = 0

      const resolver = new PomLicenseResolver({ retryDelayMs: 1 })
      assert.equal(await resolver.resolve(`${baseUrl}/lib/retry-1.0.jar`), APACHE)
      assert.equal(requests.length, 3)
    })

    it('should give up after the configured number of tries', async () => {
      failures.set('/lib/down-1.0.pom', [502, 502, 502])
      requests.length = 0

      const resolver = new PomLicenseResolver({ retryDelayMs: 1, tries: 3 })
      await assert.rejects(resolver.resolve(`${baseUrl}/lib/down-1.0.jar`), {
        name: 'LicenseLookupError',
        message: `Unable to download .pom from ${baseUrl}/lib/down-1.0.pom: HTTP 502`,
      })
      assert.equal(requests.length, 3)
    })

    it('should not retry a 404', async () => {
      requests.length = 0
      const resolver = new PomLicenseResolver({ retryDelayMs: 1 })
      await assert.rejects(resolver.resolve(`${baseUrl}/missing/x-1.0.jar`), {
        name: 'LicenseLookupError',
        message: `Unable to download .pom from ${baseUrl}/missing/x-1.0.pom: HTTP 404`,
      })
      assert.deepEqual(requests, ['/missing/x-1.0.pom'])
    })

    it('should follow redirects', async () => {
      const resolver = new PomLicenseResolver({ retryDelayMs: 1 })
      assert.equal(await resolver.resolve(`${baseUrl}/moved/lib-1.0.jar`), APACHE)
    })

    it('should stop when the signal is aborted', async () => {
      failures.set('/lib/slow-1.0.pom', [503])
      const controller = new AbortController()
      const resolver = new PomLicenseResolver({ retryDelayMs: 10_000 })

      const pending = resolver.resolve(`${baseUrl}/lib/slow-1.0.jar`, controller.signal)
      setTimeout(() => controller.abort(), 20)

      await assert.rejects(pending, {
        name: 'LicenseLookupError',
        message: 'License lookup cancelled',
      })
    })
  })
})
