import * as fs from 'fs/promises'
import * as path from 'path'
import * as yaml from 'js-yaml'
import {
  entryMatches,
  normalizePolicyEntry,
} from '../coordinate/coordinate.js'
import { PolicyListError } from '../errors.js'
import type { ZodError } from 'zod'
import {
  PolicyListMappingSchema,
  PolicyListSequenceSchema,
  type PolicyAnnotationsDocument,
} from '../schema/policy-list-schema.js'

export interface PolicyAnnotations {
  copyrightNotices: string
  interactionTypes: string[]
  resolution: string
}

export interface PolicyListEntry {
  /** Coordinate or coordinate prefix */
  readonly pattern: string
  readonly annotations: PolicyAnnotations
}

const LINE_ORIENTED_EXTENSIONS = new Set(['.txt', '.list'])

export function emptyAnnotations(): PolicyAnnotations {
  return { copyrightNotices: '', interactionTypes: [], resolution: '' }
}

/**
 * A set of coordinates and coordinate prefixes, such as the approved list,
 * the denied list or the suppressions of a run.
 */
export class PolicyList {
  private readonly entries: ReadonlyMap<string, PolicyListEntry>
  /** Entries as written, for patterns that normalization changed */
  private readonly aliases: ReadonlyMap<string, PolicyListEntry>

  private constructor(
    entries: ReadonlyMap<string, PolicyListEntry>,
    aliases: ReadonlyMap<string, PolicyListEntry> = new Map(),
  ) {
    this.entries = entries
    this.aliases = aliases
  }

  static empty(): PolicyList {
    return new PolicyList(new Map())
  }

  /**
   * Build a list from plain patterns or annotated entries. Later duplicates
   * of a pattern are ignored. A "maven:"-prefixed coordinate also matches
   * as written, since "maven" can be a real group.
   */
  static from(entries: Iterable<string | PolicyListEntry>): PolicyList {
    const byPattern = new Map<string, PolicyListEntry>()
    const aliases = new Map<string, PolicyListEntry>()
    for (const entry of entries) {
      const raw = (typeof entry === 'string' ? entry : entry.pattern).trim()
      const pattern = normalizePolicyEntry(raw)
      if (!pattern || byPattern.has(pattern)) {
        continue
      }
      const normalized: PolicyListEntry = {
        pattern,
        annotations: typeof entry === 'string' ? emptyAnnotations() : entry.annotations,
      }
      byPattern.set(pattern, normalized)
      if (raw !== pattern && !aliases.has(raw)) {
        aliases.set(raw, normalized)
      }
    }
    return new PolicyList(byPattern, aliases)
  }

  get size(): number {
    return this.entries.size
  }

  patterns(): string[] {
    return Array.from(this.entries.keys())
  }

  matches(coordinate: string): boolean {
    return this.find(coordinate) !== undefined
  }

  /**
   * The entry covering a coordinate: the exact entry when there is one,
   * otherwise the longest matching prefix.
   */
  find(coordinate: string): PolicyListEntry | undefined {
    const exact = this.entries.get(coordinate) ?? this.aliases.get(coordinate)
    if (exact) {
      return exact
    }
    let best: PolicyListEntry | undefined
    let bestLength = 0
    for (const [key, entry] of [...this.entries, ...this.aliases]) {
      if (entryMatches(key, coordinate) && key.length > bestLength) {
        best = entry
        bestLength = key.length
      }
    }
    return best
  }
}

function toList(value: string | string[] | null | undefined): string[] {
  if (value === undefined || value === null) {
    return []
  }
  return typeof value === 'string' ? [value] : value
}

const SHAPE_MESSAGE = 'expected a mapping of packages or a list of packages'

/**
 * The shape message, with the location of the first problem when it is
 * inside the document: "... (at g:a:1 > resolution: Expected string, ...)"
 */
function describeShapeError(error: ZodError): string {
  const issue = error.issues[0]
  if (issue === undefined || issue.path.length === 0) {
    return SHAPE_MESSAGE
  }
  return `${SHAPE_MESSAGE} (at ${issue.path.map(String).join(' > ')}: ${issue.message})`
}

function toAnnotations(
  document: PolicyAnnotationsDocument | null,
): PolicyAnnotations {
  return {
    copyrightNotices: document?.copyright_notices ?? '',
    interactionTypes: toList(document?.interaction_types),
    resolution: document?.resolution ?? '',
  }
}

/**
 * Parse a line-oriented list: one entry per line, "#" starts a comment.
 */
export function parseLineList(content: string): PolicyList {
  const patterns: string[] = []
  for (const line of content.split(/\r?\n/)) {
    const text = line.replace(/#.*$/, '').trim()
    if (text) {
      patterns.push(text)
    }
  }
  return PolicyList.from(patterns)
}

/**
 * Parse a YAML list: a mapping of entry -> annotations, or a sequence of
 * entries. An empty document is an empty list.
 *
 * @throws PolicyListError
 */
export function parseYamlList(content: string, source: string): PolicyList {
  let parsed: unknown
  try {
    parsed = yaml.load(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new PolicyListError(source, reason, { cause: err })
  }
  if (parsed === undefined || parsed === null) {
    return PolicyList.empty()
  }

  if (Array.isArray(parsed)) {
    const sequence = PolicyListSequenceSchema.safeParse(parsed)
    if (!sequence.success) {
      throw new PolicyListError(source, describeShapeError(sequence.error), {
        cause: sequence.error,
      })
    }
    return PolicyList.from(sequence.data)
  }

  const mapping = PolicyListMappingSchema.safeParse(parsed)
  if (!mapping.success) {
    throw new PolicyListError(source, describeShapeError(mapping.error), {
      cause: mapping.error,
    })
  }
  return PolicyList.from(
    Object.entries(mapping.data).map(([pattern, annotations]) => ({
      pattern,
      annotations: toAnnotations(annotations),
    })),
  )
}

/**
 * Read an approved or denied list from disk. ".txt" and ".list" files are
 * line-oriented; anything else is YAML.
 *
 * @throws PolicyListError when the file is unreadable or malformed
 */
export async function loadPolicyList(filePath: string): Promise<PolicyList> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new PolicyListError(filePath, reason, { cause: err })
  }

  if (LINE_ORIENTED_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
    return parseLineList(content)
  }
  return parseYamlList(content, filePath)
}
