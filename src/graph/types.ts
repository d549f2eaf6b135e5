import type {
  AUDITED_EDGE_KINDS,
  ENVIRONMENT_EDGE_KIND,
} from '../constants.js'

export type AuditedEdgeKind = (typeof AUDITED_EDGE_KINDS)[number]
export type EdgeKind = AuditedEdgeKind | typeof ENVIRONMENT_EDGE_KIND

export interface GraphEdge {
  readonly kind: EdgeKind
  /** Id of the node the edge points to */
  readonly target: string
}

/**
 * Metadata the collector reads from a build graph node
 */
export interface GraphNode {
  readonly id: string
  /** Build tags, e.g. "maven_coordinates=g:a:1" and "maven_url=https://..." */
  readonly tags: ReadonlyArray<string>
  /** Label of the node's source archive, if it has one */
  readonly srcjar?: string
}

/**
 * Read-only view of an already materialized build graph.
 * Implementations adapt whatever graph representation the build system
 * exposes.
 */
export interface BuildGraph {
  /** Returns null when the graph has no node with this id. */
  describe(id: string): GraphNode | null
  /** Outgoing edges of a node, in a stable order. */
  edges(id: string): ReadonlyArray<GraphEdge>
}
