import * as fs from 'fs/promises'
import * as yaml from 'js-yaml'
import { packageName } from '../coordinate/coordinate.js'
import {
  BomDocumentSchema,
  type BomDocument,
  type BomEntry,
} from '../schema/bom-schema.js'
import {
  emptyAnnotations,
  type PolicyAnnotations,
  type PolicyList,
} from '../policy/policy-list.js'
import type { IssueReason, PackageRecord, PolicyIssue } from '../types.js'

export interface BomLists {
  approved?: PolicyList
  denied?: PolicyList
}

/**
 * Strip carriage returns and surrounding whitespace from a license string.
 * Inner newlines are kept and rendered as a block literal.
 */
export function normalizeLicense(license: string): string {
  return license.replace(/\r/g, '').trim()
}

function annotationsFor(coordinate: string, lists: BomLists): PolicyAnnotations {
  const entry =
    lists.denied?.find(coordinate) ?? lists.approved?.find(coordinate)
  return entry?.annotations ?? emptyAnnotations()
}

function toBomEntry(
  record: PackageRecord,
  lists: BomLists,
  reason?: IssueReason,
): BomEntry {
  const annotations = annotationsFor(record.coordinate, lists)
  return {
    copyright_notices: annotations.copyrightNotices,
    interaction_types: [...annotations.interactionTypes],
    jar_url: record.jarUrl,
    license: normalizeLicense(record.license),
    'maven-artifactId': record.artifact,
    'maven-groupId': record.group,
    modified: record.modified ? 'yes' : 'no',
    name: packageName(record),
    ...(reason === undefined ? {} : { reason }),
    repository: 'Maven',
    resolution: annotations.resolution,
    url: record.sourceUrl ?? '',
    version: record.version,
  }
}

/**
 * Document keys for records in order: the coordinate, or
 * "<coordinate>#<n>" for its second and later occurrences. Numbered keys
 * skip any key another record already owns, so every record gets its own.
 */
function documentKeys(records: ReadonlyArray<PackageRecord>): string[] {
  const used = new Set(records.map(record => record.coordinate))
  const firstSeen = new Set<string>()
  return records.map(record => {
    if (!firstSeen.has(record.coordinate)) {
      firstSeen.add(record.coordinate)
      return record.coordinate
    }
    let n = 2
    while (used.has(`${record.coordinate}#${n}`)) {
      n++
    }
    const key = `${record.coordinate}#${n}`
    used.add(key)
    return key
  })
}

/**
 * The full BOM: every manifest entry with its policy annotations
 */
export function createBomDocument(
  manifest: ReadonlyArray<PackageRecord>,
  lists: BomLists = {},
): BomDocument {
  const keys = documentKeys(manifest)
  const document: BomDocument = {}
  manifest.forEach((record, i) => {
    document[keys[i]] = toBomEntry(record, lists)
  })
  return document
}

/**
 * The BOM-issues document: denied and unapproved entries with their reason
 */
export function createIssuesDocument(
  issues: ReadonlyArray<PolicyIssue>,
  lists: BomLists = {},
): BomDocument {
  const keys = documentKeys(issues.map(issue => issue.record))
  const document: BomDocument = {}
  issues.forEach((issue, i) => {
    document[keys[i]] = toBomEntry(issue.record, lists, issue.reason)
  })
  return document
}

export function serializeBom(document: BomDocument): string {
  return yaml.dump(document, { lineWidth: -1, noRefs: true })
}

export async function writeBom(
  filePath: string,
  document: BomDocument,
): Promise<void> {
  await fs.writeFile(filePath, serializeBom(document), 'utf-8')
}

/**
 * Read and validate a BOM or BOM-issues document
 */
export async function readBom(filePath: string): Promise<BomDocument> {
  const content = await fs.readFile(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = yaml.load(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new Error(`Invalid BOM ${filePath}: ${reason}`, { cause: err })
  }
  const result = BomDocumentSchema.safeParse(parsed ?? {})
  if (!result.success) {
    throw new Error(`Invalid BOM ${filePath}: ${result.error.message}`, {
      cause: result.error,
    })
  }
  return result.data
}
