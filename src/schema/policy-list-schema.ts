import { z } from 'zod'

/**
 * Review data an approved or denied list may carry for a package
 */
export const PolicyAnnotationsSchema = z
  .object({
    copyright_notices: z.string().nullish(),
    // A single interaction type may be written without a list
    interaction_types: z.union([z.string(), z.array(z.string())]).nullish(),
    resolution: z.string().nullish(),
  })
  .passthrough()

export type PolicyAnnotationsDocument = z.infer<typeof PolicyAnnotationsSchema>

export const PolicyListMappingSchema = z.record(
  z.string(), // Coordinate or coordinate prefix like "com.google.guava:guava"
  PolicyAnnotationsSchema.nullable(),
)

export const PolicyListSequenceSchema = z.array(z.string())

export const PolicyListDocumentSchema = z.union([
  PolicyListMappingSchema,
  PolicyListSequenceSchema,
])

export type PolicyListDocument = z.infer<typeof PolicyListDocumentSchema>
