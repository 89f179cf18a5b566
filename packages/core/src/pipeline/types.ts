/**
 * Pipeline type definitions
 *
 * Shared interfaces for every stage of the triage pipeline. Each stage reads
 * fields already present on {@link PipelineState} and appends exactly one.
 */

// ============================================================================
// Closed variants
// ============================================================================

export const INTENTS = [
  'sales_inquiry',
  'support_request',
  'partnership',
  'other',
] as const

export type Intent = (typeof INTENTS)[number]

export const URGENCIES = ['high', 'medium', 'low'] as const

export type Urgency = (typeof URGENCIES)[number]

export const SEVERITIES = ['low', 'medium', 'high'] as const

export type Severity = (typeof SEVERITIES)[number]

export type DecisionAction = 'auto_send' | 'human_review' | 'manual_handle'

export const PRIORITIES = ['low', 'medium', 'high'] as const

export type Priority = (typeof PRIORITIES)[number]

// ============================================================================
// Step 1: Classify
// ============================================================================

export interface Classification {
  intent: Intent
  urgency: Urgency
  companyName: string
  /** Ordered, possibly empty */
  requirements: string[]
  confidence: number
}

// ============================================================================
// Step 2: Research
// ============================================================================

export interface ResearchProfile {
  companyName: string
  industry: string
  companySize: string
  products: string[]
  relevance: string
  keyInsights: string[]
  confidence: number
}

// ============================================================================
// Step 3: Retrieve
// ============================================================================

/** Raw candidate as returned by the semantic-search collaborator */
export interface SearchCandidate {
  title: string
  content: string
  score: number
  category: string
  industry: string
  tags: string[]
}

export interface RetrievedDocument {
  title: string
  content: string
  category: string
  industry: string
  tags: string[]
  relevanceScore: number
  relevanceExplanation: string
}

export type RetrievalStrategy = 'hybrid' | 'semantic'

export interface RankedResults {
  query: string
  documents: RetrievedDocument[]
  totalFound: number
  strategy: RetrievalStrategy
}

// ============================================================================
// Step 4: Draft
// ============================================================================

export interface DraftResponse {
  subject: string
  body: string
  tone: string
  keyPoints: string[]
}

// ============================================================================
// Step 5: Validate
// ============================================================================

export interface QualityIssue {
  severity: Severity
  description: string
  suggestion: string
}

export interface QualityAssessment {
  approved: boolean
  confidence: number
  issues: QualityIssue[]
  strengths: string[]
  overallAssessment: string
  requirementsAddressed: string[]
  requirementsMissed: string[]
}

/** Which validator produced the assessment */
export type QualitySource = 'primary' | 'fallback'

// ============================================================================
// Step 6: Decide
// ============================================================================

export interface ConfidenceBreakdown {
  qualityConfidence: number
  classificationConfidence: number
  noCriticalIssues: number
  allRequirementsMet: number
}

export interface Decision {
  action: DecisionAction
  reasoning: string
  priority: Priority
  estimatedReviewTime: string
  confidenceBreakdown: ConfidenceBreakdown
  overallConfidence: number
  adjustedConfidence: number
}

// ============================================================================
// Pipeline state
// ============================================================================

export type StageName =
  | 'classify'
  | 'research'
  | 'retrieve'
  | 'draft'
  | 'validate'
  | 'decide'

export type PipelineStage =
  | 'start'
  | 'classified'
  | 'researched'
  | 'retrieved'
  | 'drafted'
  | 'validated'
  | 'decided'
  | 'error'

export interface PipelineStepResult {
  step: StageName
  durationMs: number
  success: boolean
  error?: string
}

export interface PipelineError {
  stage: StageName
  message: string
}

export interface RequestOptions {
  requestId?: string
  priority?: Priority
  metadata?: Record<string, unknown>
  /** Aborting halts the run at the stage in progress */
  signal?: AbortSignal
}

export interface PipelineState {
  requestId: string
  emailText: string
  priority?: Priority
  metadata?: Record<string, unknown>
  classification?: Classification
  research?: ResearchProfile
  retrieval?: RankedResults
  draft?: DraftResponse
  quality?: QualityAssessment
  qualitySource?: QualitySource
  decision?: Decision
  stage: PipelineStage
  error?: PipelineError
  steps: PipelineStepResult[]
  startedAt: string
  totalDurationMs: number
}
