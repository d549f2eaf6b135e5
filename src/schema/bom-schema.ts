import { z } from 'zod'

export const IssueReasonSchema = z.enum(['Denied', 'Unapproved'])

export const BomEntrySchema = z.object({
  copyright_notices: z.string(),
  interaction_types: z.array(z.string()),
  jar_url: z.string(),
  license: z.string(),
  'maven-artifactId': z.string(),
  'maven-groupId': z.string(),
  modified: z.enum(['no', 'yes']),
  name: z.string(),
  reason: IssueReasonSchema.optional(),
  repository: z.literal('Maven'),
  resolution: z.string(),
  url: z.string(),
  // Hand-edited documents may carry numeric versions
  version: z.union([z.string(), z.number()]).transform(String),
})

export type BomEntry = z.output<typeof BomEntrySchema>

export const BomDocumentSchema = z.record(
  z.string(), // Coordinate like "com.google.code.findbugs:jsr305:3.0.2"
  BomEntrySchema,
)

export type BomDocument = z.output<typeof BomDocumentSchema>
