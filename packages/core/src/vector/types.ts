/**
 * Knowledge base document types
 */
import { z } from 'zod'

export type KnowledgeCategory = 'case_study' | 'product' | 'company' | 'faq'

/**
 * Metadata stored beside each vector. The index embeds `data`.
 */
export const KnowledgeMetadataSchema = z.object({
  docId: z.string().optional(),
  title: z.string().default('Untitled'),
  content: z.string().default(''),
  category: z.string().default('unknown'),
  industry: z.string().default(''),
  tags: z.array(z.string()).default([]),
  year: z.number().optional(),
})

export type KnowledgeMetadata = z.infer<typeof KnowledgeMetadataSchema>

/**
 * Document as written in the knowledge base JSON files
 */
export const KnowledgeDocumentSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  category: z.string(),
  industry: z.string().default(''),
  tags: z.array(z.string()).default([]),
  year: z.number().optional(),
})

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>

/**
 * Vector document structure for Upstash Vector
 */
export interface VectorDocument {
  id: string
  data: string
  metadata: KnowledgeMetadata
}

/**
 * Query result from vector search
 */
export interface VectorQueryResult {
  id: string
  score: number
  data?: string
  metadata?: Record<string, unknown>
}
