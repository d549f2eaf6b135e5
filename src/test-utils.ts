/**
 * Test utilities for oss-audit tests
 */
import * as fs from 'fs/promises'
import * as path from 'path'
import * as os from 'os'
import { pathToFileURL } from 'url'
import { setTimeout as delay } from 'timers/promises'
import { JsonBuildGraph } from './graph/json-graph.js'
import type { GraphNodeDefinition } from './schema/graph-schema.js'
import type { LicenseResolver } from './license/types.js'
import { LicenseLookupError } from './errors.js'
import type { EdgeKind } from './graph/types.js'

/**
 * Create a temporary test directory
 */
export async function createTestDir(prefix: string = 'oss-audit-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

/**
 * Remove a directory recursively
 */
export async function removeTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export interface TestNodeOptions {
  coordinate?: string
  url?: string
  srcjar?: string
  tags?: string[]
  edges?: Partial<Record<EdgeKind, string[]>>
}

/**
 * Create a graph node definition, adding the coordinate and url tags
 */
export function testNode(options: TestNodeOptions = {}): GraphNodeDefinition {
  const tags = [...(options.tags ?? [])]
  if (options.coordinate !== undefined) {
    tags.push(`maven_coordinates=${options.coordinate}`)
  }
  if (options.url !== undefined) {
    tags.push(`maven_url=${options.url}`)
  }
  return {
    tags,
    srcjar: options.srcjar,
    edges: options.edges ?? {},
  }
}

/**
 * Create an in-memory build graph from node definitions
 */
export function createTestGraph(
  nodes: Record<string, GraphNodeDefinition>,
): JsonBuildGraph {
  return new JsonBuildGraph({ nodes })
}

export interface FakeLicenseResolverOptions {
  /** URLs that fail with a lookup error */
  missing?: string[]
  /** URLs that fail with a non-lookup error */
  broken?: string[]
  /** Time each lookup takes */
  delayMs?: number
}

/**
 * License resolver returning canned data and recording every call
 */
export class FakeLicenseResolver implements LicenseResolver {
  readonly calls: string[] = []
  maxInFlight = 0
  private inFlight = 0
  private readonly licenses: Record<string, string>
  private readonly missing: Set<string>
  private readonly broken: Set<string>
  private readonly delayMs: number

  constructor(
    licenses: Record<string, string> = {},
    options: FakeLicenseResolverOptions = {},
  ) {
    this.licenses = licenses
    this.missing = new Set(options.missing ?? [])
    this.broken = new Set(options.broken ?? [])
    this.delayMs = options.delayMs ?? 0
  }

  async resolve(jarUrl: string, signal?: AbortSignal): Promise<string> {
    this.calls.push(jarUrl)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (this.delayMs > 0) {
        await delay(this.delayMs, undefined, { signal })
      }
      if (this.broken.has(jarUrl)) {
        throw new TypeError(`Resolver bug for ${jarUrl}`)
      }
      if (this.missing.has(jarUrl)) {
        throw new LicenseLookupError(jarUrl, `Not found: ${jarUrl}`)
      }
      return this.licenses[jarUrl] ?? ''
    } finally {
      this.inFlight--
    }
  }
}

/**
 * Write a .pom file beside a (non-existent) jar and return the jar's file URL
 */
export async function writeTestPom(
  dir: string,
  baseName: string,
  licenseNames: string[],
  options: { namespace?: boolean } = {},
): Promise<string> {
  const xmlns = options.namespace
    ? ' xmlns="http://maven.apache.org/POM/4.0.0"'
    : ''
  const licenses = licenseNames
    .map(name => `    <license>\n      <name>${name}</name>\n    </license>`)
    .join('\n')
  const pom = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<project${xmlns}>`,
    '  <modelVersion>4.0.0</modelVersion>',
    `  <artifactId>${baseName}</artifactId>`,
    licenseNames.length > 0 ? `  <licenses>\n${licenses}\n  </licenses>` : '',
    '</project>',
  ].join('\n')
  await fs.writeFile(path.join(dir, `${baseName}.pom`), pom, 'utf-8')
  return pathToFileURL(path.join(dir, `${baseName}.jar`)).href
}
