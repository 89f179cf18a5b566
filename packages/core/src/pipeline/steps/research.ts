/**
 * Step 2: RESEARCH
 *
 * Profiles the sender's company from a web search and states how our
 * offering relates to the requirements they listed.
 */

import { generateObject } from 'ai'
import { DEFAULT_MODELS } from '../../config/env'
import { log } from '../../observability/axiom'
import type {
  CompanySearchResult,
  WebSearchClient,
} from '../../research/web-search'
import type { Researcher } from '../collaborators'
import { ResearchError, errorMessage } from '../errors'
import { researchSchema } from '../schemas'
import type { ResearchProfile } from '../types'

const RESEARCH_PROMPT = `You are a business intelligence analyst.

Given web search results about a company and the requirements they sent us, extract:
1. Industry and main products/services
2. Company size (enterprise, SME, startup)
3. How our solutions could be relevant to them
4. Key insights to personalize our reply

Stick to the sources provided. Lower your confidence when they are thin.`

export function buildResearchPrompt(
  companyName: string,
  requirements: string[],
  search: CompanySearchResult
): string {
  const sources =
    search.sources.length > 0
      ? search.sources.map((s) => `- ${s.title}: ${s.snippet}`).join('\n')
      : '- (no sources found)'
  const needs =
    requirements.length > 0
      ? requirements.map((r) => `- ${r}`).join('\n')
      : '- (none stated)'

  return `Company: ${companyName}

Web Search Summary:
${search.summary || '(none)'}

Sources:
${sources}

Their Requirements:
${needs}

Analyze this company and provide structured insights.`
}

export interface ResearchOptions {
  model?: string
  webSearch: WebSearchClient
}

export function createWebResearcher(options: ResearchOptions): Researcher {
  const { model = DEFAULT_MODELS.research, webSearch } = options

  return {
    async research(
      companyName: string,
      requirements: string[]
    ): Promise<ResearchProfile> {
      const startTime = Date.now()

      try {
        const search = await webSearch.searchCompany(companyName)
        const { object } = await generateObject({
          model,
          schema: researchSchema,
          system: RESEARCH_PROMPT,
          prompt: buildResearchPrompt(companyName, requirements, search),
        })

        await log('debug', 'research completed', {
          workflow: 'pipeline',
          step: 'research',
          model,
          companyName,
          industry: object.industry,
          sourceCount: search.sources.length,
          confidence: object.confidence,
          durationMs: Date.now() - startTime,
        })

        return object
      } catch (error) {
        throw new ResearchError({
          message: `Research failed: ${errorMessage(error)}`,
          cause: error,
        })
      }
    },
  }
}
