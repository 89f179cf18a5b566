/**
 * History types
 */

import type { HistorySink } from '../pipeline/collaborators'
import type {
  DecisionAction,
  Intent,
  Priority,
  Urgency,
} from '../pipeline/types'

/** Summary attached to every response and history entry */
export interface ResponseMetadata {
  intent: Intent
  company: string
  urgency: Urgency
  priority: Priority
  ragDocumentCount: number
}

export interface NewHistoryEntry {
  requestId: string
  emailText: string
  decision: DecisionAction
  /** Quality confidence */
  confidence: number
  subject: string
  body: string
  processingTimeMs: number
  qualityApproved: boolean
  metadata: Record<string, unknown>
}

export interface HistoryEntry extends NewHistoryEntry {
  /** ISO timestamp */
  createdAt: string
}

export interface HistoryStats {
  totalProcessed: number
  avgConfidence: number
  avgProcessingTimeMs: number
  /** Percent of entries whose draft passed quality review */
  qualityApprovalRate: number
}

export const DEFAULT_HISTORY_LIMIT = 100

/**
 * Persistent record of decided emails. Doubles as the pipeline's history sink.
 */
export interface HistoryStore extends HistorySink {
  /** Returns false when the request id is already stored */
  add(entry: NewHistoryEntry): Promise<boolean>
  get(requestId: string): Promise<HistoryEntry | null>
  /** Newest first */
  list(limit?: number): Promise<HistoryEntry[]>
  /** Returns false when nothing matched */
  delete(requestId: string): Promise<boolean>
  /** Returns the number of removed entries */
  clear(): Promise<number>
  stats(): Promise<HistoryStats>
}
