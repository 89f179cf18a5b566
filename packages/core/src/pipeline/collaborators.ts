/**
 * Contracts the orchestrator requires from the outside world.
 *
 * Concrete adapters live beside the steps (LLM, web search, vector index) and
 * under history/ and metrics/. Tests pass in-process fakes.
 */

import type {
  Classification,
  DraftResponse,
  PipelineState,
  QualityAssessment,
  RankedResults,
  ResearchProfile,
  SearchCandidate,
} from './types'

export interface Classifier {
  classify(emailText: string): Promise<Classification>
}

export interface Researcher {
  research(companyName: string, requirements: string[]): Promise<ResearchProfile>
}

export interface SemanticSearch {
  search(query: string, k: number): Promise<SearchCandidate[]>
}

export interface Drafter {
  draft(
    classification: Classification,
    research: ResearchProfile,
    retrieval: RankedResults,
    originalEmail: string
  ): Promise<DraftResponse>
}

export interface QualityValidator {
  validate(
    draft: DraftResponse,
    classification: Classification,
    originalEmail: string
  ): Promise<QualityAssessment>
}

export interface HistorySink {
  record(requestId: string, state: Readonly<PipelineState>): Promise<void>
}

export interface MetricsSink {
  record(state: Readonly<PipelineState>): Promise<void>
}

export interface PipelineDependencies {
  classifier: Classifier
  researcher: Researcher
  search: SemanticSearch
  drafter: Drafter
  /** Optional: without one every request uses the rule-based check */
  validator?: QualityValidator
  history?: HistorySink
  metrics?: MetricsSink
}
