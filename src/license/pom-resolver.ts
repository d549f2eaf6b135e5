import * as fs from 'fs/promises'
import * as https from 'node:https'
import * as http from 'node:http'
import { fileURLToPath } from 'url'
import { setTimeout as sleep } from 'timers/promises'
import { parseStringPromise, processors } from 'xml2js'
import { z } from 'zod'
import {
  DEFAULT_LOOKUP_TIMEOUT_MS,
  DEFAULT_LOOKUP_TRIES,
  DEFAULT_RETRY_DELAY_MS,
  RETRY_STATUS_CODES,
} from '../constants.js'
import { LicenseLookupError } from '../errors.js'
import { debug } from '../utils.js'
import type { LicenseResolver } from './types.js'

const MAX_REDIRECTS = 5

export interface PomLicenseResolverOptions {
  /** Attempts per .pom download (default: 3) */
  tries?: number
  /** Wait between attempts (default: 3000) */
  retryDelayMs?: number
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number
}

// xml2js renders a text-only element as a string, and as { _: text } when it
// carries attributes
const TextNodeSchema = z.union([
  z.string(),
  z.object({ _: z.string().optional() }),
])

const PomSchema = z.object({
  project: z.union([
    z.string(),
    z.object({
      licenses: z
        .array(
          z.union([
            z.string(),
            z.object({
              license: z
                .array(
                  z.union([
                    z.string(),
                    z.object({ name: z.array(TextNodeSchema).optional() }),
                  ]),
                )
                .optional(),
            }),
          ]),
        )
        .optional(),
    }),
  ]),
})

/**
 * Location of the .pom published beside a jar.
 * e.g., "https://r/g/a/1.0/a-1.0.jar" -> "https://r/g/a/1.0/a-1.0.pom"
 *
 * @throws LicenseLookupError when the URL does not name a .jar file
 */
export function pomUrlForJar(jarUrl: string): string {
  if (!jarUrl.endsWith('.jar')) {
    throw new LicenseLookupError(jarUrl, `Not a jar URL: ${jarUrl}`)
  }
  return `${jarUrl.slice(0, -'.jar'.length)}.pom`
}

/**
 * Extract license names from POM XML, in document order.
 * Namespaces and namespace prefixes are ignored.
 */
export async function parsePomLicenses(xml: string): Promise<string[]> {
  const document: unknown = await parseStringPromise(xml, {
    tagNameProcessors: [processors.stripPrefix],
  })
  const pom = PomSchema.parse(document)
  if (typeof pom.project === 'string') {
    return []
  }

  const names: string[] = []
  for (const licenses of pom.project.licenses ?? []) {
    if (typeof licenses === 'string') continue
    for (const license of licenses.license ?? []) {
      if (typeof license === 'string') continue
      for (const name of license.name ?? []) {
        const text = (typeof name === 'string' ? name : name._ ?? '').trim()
        if (text) {
          names.push(text)
        }
      }
    }
  }
  return names
}

interface HttpResponse {
  statusCode: number
  body: string
  location?: string
}

function httpGet(
  url: URL,
  signal: AbortSignal | undefined,
  timeoutMs: number,
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const httpModule = url.protocol === 'https:' ? https : http
    const options: https.RequestOptions = {
      method: 'GET',
      headers: { Accept: 'application/xml' },
      signal,
    }

    const req = httpModule.request(url, options, res => {
      let data = ''
      res.setEncoding('utf-8')
      res.on('data', (chunk: string) => {
        data += chunk
      })
      res.on('end', () => {
        resolve({
          statusCode: res.statusCode ?? 0,
          body: data,
          location: res.headers.location,
        })
      })
      res.on('error', reject)
    })

    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`Request timed out after ${timeoutMs} ms`))
    })
    req.on('error', reject)
    req.end()
  })
}

/**
 * Default license resolver: reads the license names declared in the Maven
 * POM that is published next to each jar.
 */
export class PomLicenseResolver implements LicenseResolver {
  private readonly tries: number
  private readonly retryDelayMs: number
  private readonly timeoutMs: number

  constructor(options: PomLicenseResolverOptions = {}) {
    this.tries = Math.max(1, options.tries ?? DEFAULT_LOOKUP_TRIES)
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS
  }

  /**
   * Resolve to the POM's license names joined with ";", or "" when the POM
   * declares none.
   */
  async resolve(jarUrl: string, signal?: AbortSignal): Promise<string> {
    let pomUrl: URL
    try {
      pomUrl = new URL(pomUrlForJar(jarUrl))
    } catch (err) {
      if (err instanceof LicenseLookupError) throw err
      throw new LicenseLookupError(jarUrl, `Invalid artifact URL: ${jarUrl}`, {
        cause: err,
      })
    }

    const xml = await this.fetchPom(jarUrl, pomUrl, signal)
    let names: string[]
    try {
      names = await parsePomLicenses(xml)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new LicenseLookupError(
        jarUrl,
        `Unable to parse .pom from ${pomUrl.href}: ${reason}`,
        { cause: err },
      )
    }
    if (names.length === 0) {
      debug(`No license metadata found in ${pomUrl.href}`)
    }
    return names.join(';')
  }

  private async fetchPom(
    jarUrl: string,
    pomUrl: URL,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    switch (pomUrl.protocol) {
      case 'file:':
        try {
          return await fs.readFile(fileURLToPath(pomUrl), 'utf-8')
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err)
          throw new LicenseLookupError(
            jarUrl,
            `Unable to read .pom from ${pomUrl.href}: ${reason}`,
            { cause: err },
          )
        }
      case 'http:':
      case 'https:':
        return this.download(jarUrl, pomUrl, signal)
      default:
        throw new LicenseLookupError(
          jarUrl,
          `Unsupported protocol ${pomUrl.protocol} in ${jarUrl}`,
        )
    }
  }

  /**
   * Download with retries on transient failures
   */
  private async download(
    jarUrl: string,
    pomUrl: URL,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    let lastFailure = ''

    for (let attempt = 1; attempt <= this.tries; attempt++) {
      debug(`Downloading .pom from: ${pomUrl.href}`)
      let retryable: boolean
      try {
        const response = await this.followRedirects(pomUrl, signal)
        if (response.statusCode === 200) {
          return response.body
        }
        lastFailure = `HTTP ${response.statusCode}`
        retryable = RETRY_STATUS_CODES.has(response.statusCode)
      } catch (err) {
        if (signal?.aborted) {
          throw new LicenseLookupError(jarUrl, 'License lookup cancelled', {
            cause: err,
          })
        }
        lastFailure = err instanceof Error ? err.message : String(err)
        retryable = true
      }
      debug(`Download failed: ${pomUrl.href}: ${lastFailure}`)

      if (!retryable || attempt === this.tries) break

      debug(`Retrying in ${this.retryDelayMs} ms...`)
      try {
        await sleep(this.retryDelayMs, undefined, { signal })
      } catch (err) {
        throw new LicenseLookupError(jarUrl, 'License lookup cancelled', {
          cause: err,
        })
      }
    }

    throw new LicenseLookupError(
      jarUrl,
      `Unable to download .pom from ${pomUrl.href}: ${lastFailure}`,
    )
  }

  private async followRedirects(
    url: URL,
    signal: AbortSignal | undefined,
  ): Promise<HttpResponse> {
    let current = url
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await httpGet(current, signal, this.timeoutMs)
      if (
        response.statusCode < 300 ||
        response.statusCode >= 400 ||
        response.location === undefined
      ) {
        return response
      }
      current = new URL(response.location, current)
    }
    throw new Error(`Too many redirects for ${url.href}`)
  }
}
