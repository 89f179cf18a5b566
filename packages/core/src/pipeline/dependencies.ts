/**
 * Production collaborators: models through the AI gateway, Tavily for web
 * search and Upstash Vector for the knowledge base.
 */

import type { TriageConfig } from '../config/env'
import { createTavilyClient } from '../research/web-search'
import { createUpstashSearch } from '../vector/search'
import type {
  HistorySink,
  MetricsSink,
  PipelineDependencies,
} from './collaborators'
import { createLlmClassifier } from './steps/classify'
import { createLlmDrafter } from './steps/draft'
import { createWebResearcher } from './steps/research'
import { createLlmValidator } from './steps/validate'

export interface ReportingSinks {
  history?: HistorySink
  metrics?: MetricsSink
}

export function createDefaultDependencies(
  config: TriageConfig,
  sinks: ReportingSinks = {}
): PipelineDependencies {
  return {
    classifier: createLlmClassifier({ model: config.models.classify }),
    researcher: createWebResearcher({
      model: config.models.research,
      webSearch: createTavilyClient({ apiKey: config.tavilyApiKey }),
    }),
    search: createUpstashSearch(),
    drafter: createLlmDrafter({ model: config.models.draft }),
    validator: createLlmValidator({ model: config.models.validate }),
    ...sinks,
  }
}
