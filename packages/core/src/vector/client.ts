import { Index } from '@upstash/vector'
import { env } from '../config/env'
import type { VectorDocument, VectorQueryResult } from './types'

/**
 * Lazy-initialized Upstash Vector index singleton.
 * Avoids creating connections at import time.
 */
let _index: Index | null = null

/**
 * Get or create the Upstash Vector index instance.
 *
 * @throws {Error} If UPSTASH_VECTOR_URL or UPSTASH_VECTOR_TOKEN env vars are missing
 */
export function getVectorIndex(): Index {
  if (!_index) {
    const url = env.UPSTASH_VECTOR_URL
    const token = env.UPSTASH_VECTOR_TOKEN

    if (!url) {
      throw new Error('UPSTASH_VECTOR_URL environment variable is required')
    }
    if (!token) {
      throw new Error('UPSTASH_VECTOR_TOKEN environment variable is required')
    }

    _index = new Index({
      url,
      token,
    })
  }

  return _index
}

/** Drop the cached index (tests, credential rotation) */
export function resetVectorIndex(): void {
  _index = null
}

/**
 * Options for querying vectors
 */
export interface QueryVectorsOptions {
  /** The search query text */
  data: string
  /** Number of results to return */
  topK: number
  /** Include metadata in results */
  includeMetadata?: boolean
  /** Include data in results */
  includeData?: boolean
}

/**
 * Upsert documents into the index. The index embeds each `data` string.
 */
export async function upsertVectors(documents: VectorDocument[]): Promise<void> {
  if (documents.length === 0) return
  const index = getVectorIndex()
  await index.upsert(
    documents.map((document) => ({
      id: document.id,
      data: document.data,
      metadata: document.metadata,
    }))
  )
}

/**
 * Query vectors by semantic similarity.
 */
export async function queryVectors(
  options: QueryVectorsOptions
): Promise<VectorQueryResult[]> {
  const index = getVectorIndex()
  const results = await index.query(options)

  return results.map((result) => ({
    id: String(result.id),
    score: result.score,
    data: result.data,
    metadata: result.metadata,
  }))
}

/**
 * Number of vectors currently stored.
 */
export async function countVectors(): Promise<number> {
  const index = getVectorIndex()
  const info = await index.info()
  return info.vectorCount
}
