import { z } from 'zod'
import { ALL_EDGE_KINDS } from '../constants.js'

export const EdgeKindSchema = z.enum(ALL_EDGE_KINDS)

export const GraphNodeDefinitionSchema = z.object({
  tags: z.array(z.string()).default([]),
  srcjar: z.string().optional(),
  edges: z.record(EdgeKindSchema, z.array(z.string())).default({}),
})

export type GraphNodeDefinition = z.infer<typeof GraphNodeDefinitionSchema>

export const BuildGraphDocumentSchema = z.object({
  nodes: z.record(
    z.string(), // Node label like "//app:server"
    GraphNodeDefinitionSchema,
  ),
})

export type BuildGraphDocument = z.infer<typeof BuildGraphDocumentSchema>
