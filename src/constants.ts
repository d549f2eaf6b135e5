/**
 * Standard names and defaults used throughout the oss-audit system
 */

/**
 * Edge kinds followed when collecting the audited dependency closure
 */
export const AUDITED_EDGE_KINDS = [
  'data',
  'srcs',
  'deps',
  'exports',
  'jar',
  'runtime_deps',
] as const

/**
 * Edge kind naming dependencies supplied by the deployment environment
 */
export const ENVIRONMENT_EDGE_KIND = 'deploy_env' as const

export const ALL_EDGE_KINDS = [
  ...AUDITED_EDGE_KINDS,
  ENVIRONMENT_EDGE_KIND,
] as const

export const MAVEN_COORDINATES_TAG = 'maven_coordinates'
export const MAVEN_URL_TAG = 'maven_url'

export const BOM_FILE_SUFFIX = '.bom.yaml'
export const BOM_ISSUES_FILE_SUFFIX = '.bom-issues.yaml'

/**
 * Upper bound on the default license lookup pool size
 */
export const MAX_DEFAULT_CONCURRENCY = 8

// Written by the license command when nothing could be resolved
export const UNKNOWN_LICENSE = 'UNKNOWN'

export const RETRY_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 502, 503, 504,
])
export const DEFAULT_LOOKUP_TRIES = 3
export const DEFAULT_RETRY_DELAY_MS = 3000
export const DEFAULT_LOOKUP_TIMEOUT_MS = 30_000
