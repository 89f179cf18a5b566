/**
 * @inbox-triage/core
 *
 * Email triage pipeline, its collaborators and the service the CLI drives.
 */

/** Package version */
export const VERSION = '0.1.0'

// Config
export {
  DEFAULT_MODELS,
  env,
  loadConfig,
  type TriageConfig,
} from './config/env'

// Pipeline
export * from './pipeline'
export {
  createDefaultDependencies,
  type ReportingSinks,
} from './pipeline/dependencies'
export {
  AUTO_SEND_THRESHOLD,
  CONFIDENCE_WEIGHTS,
  HUMAN_REVIEW_THRESHOLD,
  REVIEW_TIME_ESTIMATES,
  URGENCY_MULTIPLIERS,
} from './pipeline/thresholds'

// Database
export { closeDb, hasDatabaseUrl } from '@inbox-triage/database'

// Observability
export {
  flushAxiom,
  initializeAxiom,
  log,
  withTracing,
  type LogLevel,
} from './observability/axiom'

// Metrics
export * from './metrics'

// History
export * from './history'

// Research
export {
  createTavilyClient,
  type CompanySearchResult,
  type WebSearchClient,
} from './research/web-search'

// Knowledge base
export { countVectors, getVectorIndex } from './vector/client'
export {
  KNOWLEDGE_FILES,
  loadKnowledgeDocuments,
  seedKnowledgeBase,
  type SeedResult,
} from './vector/knowledge'
export { createUpstashSearch } from './vector/search'
export type { KnowledgeDocument } from './vector/types'

// Services
export {
  InvalidRequestError,
  type ProcessEmailOptions,
  TriageRequestSchema,
  createTriageService,
  type TriageRequest,
  type TriageResponse,
  type TriageService,
} from './services/triage'
export {
  createDefaultTriageService,
  createHistoryStore,
} from './services/default-service'
