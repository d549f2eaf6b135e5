import * as fs from 'fs/promises'
import { ALL_EDGE_KINDS } from '../constants.js'
import { GraphError } from '../errors.js'
import {
  BuildGraphDocumentSchema,
  type BuildGraphDocument,
  type GraphNodeDefinition,
} from '../schema/graph-schema.js'
import type { BuildGraph, GraphEdge, GraphNode } from './types.js'

/**
 * Build graph backed by a JSON export of the build system's target graph.
 */
export class JsonBuildGraph implements BuildGraph {
  private readonly nodes: ReadonlyMap<string, GraphNodeDefinition>

  constructor(document: BuildGraphDocument) {
    this.nodes = new Map(Object.entries(document.nodes))
  }

  get size(): number {
    return this.nodes.size
  }

  describe(id: string): GraphNode | null {
    const definition = this.nodes.get(id)
    if (!definition) {
      return null
    }
    return { id, tags: definition.tags, srcjar: definition.srcjar }
  }

  edges(id: string): ReadonlyArray<GraphEdge> {
    const definition = this.nodes.get(id)
    if (!definition) {
      return []
    }
    const edges: GraphEdge[] = []
    // Fixed kind order keeps traversal independent of JSON key order
    for (const kind of ALL_EDGE_KINDS) {
      for (const target of definition.edges[kind] ?? []) {
        edges.push({ kind, target })
      }
    }
    return edges
  }
}

/**
 * Validate a parsed graph export
 */
export function parseGraphDocument(parsed: unknown): JsonBuildGraph {
  const result = BuildGraphDocumentSchema.safeParse(parsed)
  if (!result.success) {
    throw new GraphError(`Invalid build graph: ${result.error.message}`)
  }
  return new JsonBuildGraph(result.data)
}

/**
 * Read and validate a graph export from the filesystem
 *
 * @throws GraphError when the file is unreadable or malformed
 */
export async function loadJsonGraph(path: string): Promise<JsonBuildGraph> {
  let parsed: unknown
  try {
    const content = await fs.readFile(path, 'utf-8')
    parsed = JSON.parse(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new GraphError(`Unable to read build graph ${path}: ${reason}`, {
      cause: err,
    })
  }
  return parseGraphDocument(parsed)
}
