/**
 * Company web search via the Tavily REST API.
 *
 * Research enriches a reply but is never required: any failure here returns
 * an empty result and the researcher works from the email alone.
 */

import { z } from 'zod'
import { log } from '../observability/axiom'

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search'
const SNIPPET_LENGTH = 200

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string().default(''),
      })
    )
    .default([]),
})

export interface WebSource {
  title: string
  url: string
  snippet: string
}

export interface CompanySearchResult {
  company: string
  summary: string
  sources: WebSource[]
}

export interface WebSearchClient {
  searchCompany(companyName: string): Promise<CompanySearchResult>
}

export interface TavilyClientConfig {
  apiKey?: string
  maxResults?: number
  fetchFn?: typeof fetch
}

export function emptySearchResult(companyName: string): CompanySearchResult {
  return { company: companyName, summary: '', sources: [] }
}

export function createTavilyClient(
  config: TavilyClientConfig = {}
): WebSearchClient {
  const { apiKey, maxResults = 3, fetchFn = fetch } = config

  return {
    async searchCompany(companyName: string): Promise<CompanySearchResult> {
      if (!apiKey) {
        await log('warn', 'web search skipped, TAVILY_API_KEY not set', {
          workflow: 'pipeline',
          step: 'research',
          companyName,
        })
        return emptySearchResult(companyName)
      }

      const query = `${companyName} company information industry products services`
      const startTime = Date.now()

      try {
        const response = await fetchFn(TAVILY_SEARCH_URL, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            query,
            max_results: maxResults,
            search_depth: 'basic',
            include_answer: true,
            include_raw_content: false,
          }),
        })

        if (!response.ok) {
          throw new Error(`Tavily returned ${response.status} ${response.statusText}`)
        }

        const data = TavilyResponseSchema.parse(await response.json())

        await log('debug', 'web search completed', {
          workflow: 'pipeline',
          step: 'research',
          companyName,
          sourceCount: data.results.length,
          durationMs: Date.now() - startTime,
        })

        return {
          company: companyName,
          summary: data.answer ?? '',
          sources: data.results.map((result) => ({
            title: result.title,
            url: result.url,
            snippet: result.content.slice(0, SNIPPET_LENGTH),
          })),
        }
      } catch (error) {
        await log('warn', 'web search failed, continuing without results', {
          workflow: 'pipeline',
          step: 'research',
          companyName,
          error: error instanceof Error ? error.message : 'Unknown error',
          durationMs: Date.now() - startTime,
        })
        return emptySearchResult(companyName)
      }
    },
  }
}
