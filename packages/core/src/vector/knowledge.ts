/**
 * Knowledge base seeding
 *
 * Loads case studies and company information from JSON files and upserts them
 * into the vector index, but only into an empty index.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { log } from '../observability/axiom'
import { countVectors, upsertVectors } from './client'
import {
  type KnowledgeDocument,
  KnowledgeDocumentSchema,
  type VectorDocument,
} from './types'

export const KNOWLEDGE_FILES = ['case_studies.json', 'company_info.json'] as const

/**
 * Read every knowledge file present in `dir`. Missing files are skipped.
 */
export function loadKnowledgeDocuments(dir: string): KnowledgeDocument[] {
  const documents: KnowledgeDocument[] = []

  for (const file of KNOWLEDGE_FILES) {
    const path = join(dir, file)
    if (!existsSync(path)) continue

    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    documents.push(...z.array(KnowledgeDocumentSchema).parse(raw))
  }

  return documents
}

export function toVectorDocument(document: KnowledgeDocument): VectorDocument {
  return {
    id: document.id,
    data: `${document.title}\n\n${document.content}`,
    metadata: {
      docId: document.id,
      title: document.title,
      content: document.content,
      category: document.category,
      industry: document.industry,
      tags: document.tags,
      year: document.year,
    },
  }
}

export interface SeedResult {
  seeded: number
  skipped: boolean
  existingCount: number
}

export async function seedKnowledgeBase(
  documents: KnowledgeDocument[]
): Promise<SeedResult> {
  const existingCount = await countVectors()

  if (existingCount > 0) {
    await log('info', 'knowledge base already populated, skipping seed', {
      existingCount,
    })
    return { seeded: 0, skipped: true, existingCount }
  }

  await upsertVectors(documents.map(toVectorDocument))

  await log('info', 'knowledge base seeded', {
    seeded: documents.length,
  })

  return { seeded: documents.length, skipped: false, existingCount }
}
