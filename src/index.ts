export type {
  AuditSummary,
  AuditWarning,
  CollectedPackage,
  IssueReason,
  PackageRecord,
  PolicyIssue,
  Verdict,
} from './types.js'
export { formatAuditSummary, log, warn, error } from './utils.js'
export * from './errors.js'

// Build graph access and traversal
export type { BuildGraph, GraphEdge, GraphNode, EdgeKind } from './graph/types.js'
export * from './graph/collector.js'
export * from './graph/json-graph.js'
export * from './coordinate/coordinate.js'

// License resolution
export type { LicenseOutcome, LicenseResolver } from './license/types.js'
export * from './license/resolve-all.js'
export * from './license/pom-resolver.js'

// Manifest, policy and BOM documents
export * from './manifest/builder.js'
export * from './policy/policy-list.js'
export * from './policy/evaluator.js'
export * from './bom/document.js'
export * from './audit/audit.js'

// Re-export schemas
export * from './schema/graph-schema.js'
export * from './schema/policy-list-schema.js'
export * from './schema/bom-schema.js'

export { runAudit, type AuditRunOptions } from './run.js'
export { getAuditConfigFromEnv, type AuditConfig } from './utils/config.js'

// Re-export constants
export * from './constants.js'
