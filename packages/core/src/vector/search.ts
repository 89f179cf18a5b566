import type { SemanticSearch } from '../pipeline/collaborators'
import type { SearchCandidate } from '../pipeline/types'
import { log } from '../observability/axiom'
import { queryVectors } from './client'
import { KnowledgeMetadataSchema } from './types'

/**
 * Semantic search over the Upstash knowledge index. Results whose metadata
 * does not parse are dropped.
 */
export function createUpstashSearch(): SemanticSearch {
  return {
    async search(query: string, k: number): Promise<SearchCandidate[]> {
      const startTime = Date.now()
      const results = await queryVectors({
        data: query,
        topK: k,
        includeMetadata: true,
        includeData: true,
      })

      const candidates: SearchCandidate[] = []
      for (const result of results) {
        const parsed = KnowledgeMetadataSchema.safeParse(result.metadata ?? {})
        if (!parsed.success) continue
        const metadata = parsed.data
        candidates.push({
          title: metadata.title,
          content: metadata.content || result.data || '',
          score: result.score,
          category: metadata.category,
          industry: metadata.industry,
          tags: metadata.tags,
        })
      }

      await log('debug', 'vector search completed', {
        workflow: 'pipeline',
        step: 'retrieve',
        topK: k,
        resultCount: results.length,
        candidateCount: candidates.length,
        topScore: candidates[0]?.score ?? 0,
        durationMs: Date.now() - startTime,
      })

      return candidates
    },
  }
}
