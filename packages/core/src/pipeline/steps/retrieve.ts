/**
 * Step 3: RETRIEVE
 *
 * Pulls candidates from semantic search and, when the classification produced
 * requirements, re-ranks them with a keyword boost.
 */

import type { SemanticSearch } from '../collaborators'
import { RetrievalError, errorMessage } from '../errors'
import type {
  RankedResults,
  RetrievedDocument,
  SearchCandidate,
} from '../types'

/** Score multiplier added per matching keyword */
export const KEYWORD_BOOST = 0.2

export interface RetrieveInput {
  query: string
  industry?: string
  requirements?: string[]
  limit: number
}

export interface BoostedCandidate extends SearchCandidate {
  matchCount: number
}

// ============================================================================
// Ranking
// ============================================================================

export function countKeywordMatches(
  candidate: SearchCandidate,
  keywords: string[]
): number {
  const content = candidate.content.toLowerCase()
  const tags = candidate.tags.map((tag) => tag.toLowerCase())

  return keywords.filter((keyword) => {
    const needle = keyword.toLowerCase()
    return content.includes(needle) || tags.includes(needle)
  }).length
}

/**
 * Boost each score by 20% per matching keyword, then sort descending.
 * Array.prototype.sort is stable, so ties keep collaborator order.
 */
export function boostCandidates(
  candidates: SearchCandidate[],
  keywords: string[]
): BoostedCandidate[] {
  return candidates
    .map((candidate) => {
      const matchCount = countKeywordMatches(candidate, keywords)
      return {
        ...candidate,
        matchCount,
        score: candidate.score * (1 + KEYWORD_BOOST * matchCount),
      }
    })
    .sort((a, b) => b.score - a.score)
}

export function explainRelevance(
  candidate: SearchCandidate,
  requirements: string[] = []
): string {
  const reasons: string[] = []

  if (candidate.category === 'case_study') {
    reasons.push('similar past project')
  } else if (candidate.category === 'product') {
    reasons.push('relevant product offering')
  }

  if (candidate.industry) {
    reasons.push(`same industry (${candidate.industry})`)
  }

  if (requirements.length > 0) {
    const matchingTags = candidate.tags.filter((tag) =>
      requirements.some((requirement) =>
        tag.toLowerCase().includes(requirement.toLowerCase())
      )
    )
    if (matchingTags.length > 0) {
      reasons.push(`matches requirements: ${matchingTags.slice(0, 2).join(', ')}`)
    }
  }

  if (reasons.length === 0) return 'High semantic similarity to query'
  return reasons.join(' | ')
}

// ============================================================================
// Main
// ============================================================================

export async function retrieve(
  search: SemanticSearch,
  { query, industry, requirements = [], limit }: RetrieveInput
): Promise<RankedResults> {
  const enhancedQuery = industry ? `${query} ${industry}` : query
  const hybrid = requirements.length > 0

  let candidates: SearchCandidate[]
  try {
    candidates = await search.search(enhancedQuery, hybrid ? limit * 2 : limit)
  } catch (error) {
    throw new RetrievalError({ message: errorMessage(error), cause: error })
  }

  if (hybrid) {
    const keywords = industry ? [...requirements, industry] : requirements
    candidates = boostCandidates(candidates, keywords).slice(0, limit)
  }

  const documents: RetrievedDocument[] = candidates.map((candidate) => ({
    title: candidate.title,
    content: candidate.content,
    category: candidate.category,
    industry: candidate.industry,
    tags: candidate.tags,
    relevanceScore: candidate.score,
    relevanceExplanation: explainRelevance(candidate, requirements),
  }))

  return {
    query,
    documents,
    totalFound: documents.length,
    strategy: hybrid ? 'hybrid' : 'semantic',
  }
}
