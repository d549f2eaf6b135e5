import {
  AUDITED_EDGE_KINDS,
  ENVIRONMENT_EDGE_KIND,
  MAVEN_COORDINATES_TAG,
  MAVEN_URL_TAG,
} from '../constants.js'
import {
  comparePackages,
  packageKey,
  parseCoordinate,
} from '../coordinate/coordinate.js'
import { CoordinateError, GraphError } from '../errors.js'
import type { CollectedPackage } from '../types.js'
import { warn } from '../utils.js'
import type { BuildGraph, GraphNode } from './types.js'

export interface CollectWarning {
  readonly node: string
  readonly message: string
}

export interface CollectResult {
  /** Bundled packages, deduplicated and sorted */
  readonly closure: ReadonlyArray<CollectedPackage>
  /** Packages reachable only through deploy_env edges, sorted */
  readonly environment: ReadonlyArray<CollectedPackage>
  readonly warnings: ReadonlyArray<CollectWarning>
}

const AUDITED_KINDS: ReadonlySet<string> = new Set(AUDITED_EDGE_KINDS)

/**
 * Value of a "key=value" build tag. Everything after the first "=" so URLs
 * with query strings survive.
 */
function tagValue(tag: string): string {
  return tag.slice(tag.indexOf('=') + 1)
}

/**
 * Derive the download URL of a source archive from its label.
 * e.g., "@maven//:v1/https/repo1.maven.org/a/b-sources.jar"
 *   -> "https://repo1.maven.org/a/b-sources.jar"
 */
export function sourceUrlFromSrcjar(srcjar: string): string {
  if (srcjar.includes('://')) {
    return srcjar
  }
  const name = srcjar.slice(srcjar.lastIndexOf(':') + 1)
  return name.replace('v1/https/', 'https://').replace('v1/http/', 'http://')
}

/**
 * Read the package identity carried by a node's tags.
 * Returns null for nodes without coordinates.
 *
 * @throws CoordinateError when the coordinate tag is malformed
 */
export function extractPackage(node: GraphNode): CollectedPackage | null {
  let coordinate = ''
  let jarUrl = ''
  for (const tag of node.tags) {
    if (tag.startsWith(`${MAVEN_COORDINATES_TAG}=`)) {
      coordinate = tagValue(tag)
    } else if (tag.startsWith(`${MAVEN_URL_TAG}=`)) {
      jarUrl = tagValue(tag)
    }
  }
  if (!coordinate) {
    return null
  }

  const parsed = parseCoordinate(coordinate)
  const pkg: CollectedPackage = { coordinate, ...parsed, jarUrl }
  return node.srcjar ? { ...pkg, sourceUrl: sourceUrlFromSrcjar(node.srcjar) } : pkg
}

/**
 * Collect the dependency closure of a build target.
 *
 * Walks data, srcs, deps, exports, jar and runtime_deps edges transitively,
 * visiting each node once. The closure of every deploy_env target is
 * gathered separately as the environment set.
 *
 * @throws GraphError when an edge points at a node the graph does not know
 */
export function collectClosure(
  graph: BuildGraph,
  target: string,
): CollectResult {
  const warnings: CollectWarning[] = []
  const extracted = new Map<string, CollectedPackage | null>()

  const packageOf = (id: string): CollectedPackage | null => {
    const cached = extracted.get(id)
    if (cached !== undefined) {
      return cached
    }
    const node = describeNode(graph, id)
    let pkg: CollectedPackage | null = null
    try {
      pkg = extractPackage(node)
    } catch (err) {
      if (!(err instanceof CoordinateError)) {
        throw err
      }
      warnings.push({ node: id, message: err.message })
      warn(`Skipping ${id}: ${err.message}`)
    }
    extracted.set(id, pkg)
    return pkg
  }

  const audited = walk(graph, [target])
  const environment = walk(graph, audited.environmentRoots)

  const closure = dedupe(audited.visited.map(packageOf))
  const closureKeys = new Set(closure.map(packageKey))
  const environmentOnly = dedupe(environment.visited.map(packageOf)).filter(
    pkg => !closureKeys.has(packageKey(pkg)),
  )

  return { closure, environment: environmentOnly, warnings }
}

function describeNode(graph: BuildGraph, id: string): GraphNode {
  const node = graph.describe(id)
  if (node === null) {
    throw new GraphError(`Unknown build graph node: ${id}`)
  }
  return node
}

interface WalkResult {
  /** Visited node ids, in visit order */
  visited: string[]
  /** deploy_env targets seen on visited nodes */
  environmentRoots: string[]
}

/**
 * Iterative depth-first walk over the audited edge kinds.
 */
function walk(graph: BuildGraph, roots: ReadonlyArray<string>): WalkResult {
  const seen = new Set<string>()
  const visited: string[] = []
  const environmentRoots: string[] = []
  const stack = [...roots].reverse()

  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined || seen.has(id)) continue
    seen.add(id)
    describeNode(graph, id)
    visited.push(id)

    const next: string[] = []
    for (const edge of graph.edges(id)) {
      if (edge.kind === ENVIRONMENT_EDGE_KIND) {
        environmentRoots.push(edge.target)
      } else if (AUDITED_KINDS.has(edge.kind) && !seen.has(edge.target)) {
        next.push(edge.target)
      }
    }
    // Push in reverse so edges are visited in declaration order
    for (let i = next.length - 1; i >= 0; i--) {
      stack.push(next[i])
    }
  }

  return { visited, environmentRoots }
}

function dedupe(
  packages: ReadonlyArray<CollectedPackage | null>,
): CollectedPackage[] {
  const byKey = new Map<string, CollectedPackage>()
  for (const pkg of packages) {
    if (pkg !== null && !byKey.has(packageKey(pkg))) {
      byKey.set(packageKey(pkg), pkg)
    }
  }
  return Array.from(byKey.values()).sort(comparePackages)
}
