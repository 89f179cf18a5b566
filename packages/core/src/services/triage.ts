/**
 * Triage service
 *
 * Transport-agnostic request surface over the pipeline: one call per email,
 * plus history and statistics reads. The CLI is the only caller today.
 */

import { z } from 'zod'
import { buildResponseMetadata } from '../history/entry'
import {
  DEFAULT_HISTORY_LIMIT,
  type HistoryEntry,
  type HistoryStats,
  type HistoryStore,
  type ResponseMetadata,
} from '../history/types'
import {
  type MetricsSummary,
  readMetricsLog,
  summarizeMetrics,
} from '../metrics/collector'
import { log } from '../observability/axiom'
import type { Pipeline } from '../pipeline'
import { PipelineFailure } from '../pipeline/errors'
import {
  type DecisionAction,
  PRIORITIES,
  type PipelineState,
} from '../pipeline/types'

export const TriageRequestSchema = z.object({
  emailText: z
    .string()
    .refine((text) => text.trim().length > 0, 'Email text is empty'),
  priority: z.enum(PRIORITIES).optional(),
  metadata: z.record(z.unknown()).optional(),
})

export type TriageRequest = z.input<typeof TriageRequestSchema>

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidRequestError'
  }
}

export interface TriageResponse {
  requestId: string
  decision: DecisionAction
  /** Quality confidence */
  confidence: number
  subject: string
  body: string
  processingTimeMs: number
  approved: boolean
  issuesFound: number
  metadata: ResponseMetadata
}

export interface ProcessEmailOptions {
  requestId?: string
  /** Cancels the run; it then fails like any other halted stage */
  signal?: AbortSignal
}

export interface TriageService {
  processEmail(
    request: TriageRequest,
    options?: ProcessEmailOptions
  ): Promise<TriageResponse>
  listHistory(limit?: number): Promise<HistoryEntry[]>
  getHistoryEntry(requestId: string): Promise<HistoryEntry | null>
  deleteHistoryEntry(requestId: string): Promise<boolean>
  clearHistory(): Promise<number>
  getStats(): Promise<HistoryStats>
  /** null when nothing has been logged yet */
  getMetricsSummary(): Promise<MetricsSummary | null>
  /** Wait for background history and metrics writes */
  flush(): Promise<void>
}

export interface TriageServiceOptions {
  pipeline: Pipeline
  history: HistoryStore
  metricsLogPath?: string
}

function toResponse(state: Readonly<PipelineState>): TriageResponse {
  const { classification, retrieval, draft, quality, decision } = state
  if (!classification || !draft || !quality || !decision) {
    throw new PipelineFailure({
      requestId: state.requestId,
      stage: state.error?.stage ?? 'decide',
      message: state.error?.message ?? 'Pipeline ended without a decision',
    })
  }

  return {
    requestId: state.requestId,
    decision: decision.action,
    confidence: quality.confidence,
    subject: draft.subject,
    body: draft.body,
    processingTimeMs: state.totalDurationMs,
    approved: quality.approved,
    issuesFound: quality.issues.length,
    metadata: buildResponseMetadata(classification, decision, retrieval),
  }
}

export function createTriageService(
  options: TriageServiceOptions
): TriageService {
  const { pipeline, history, metricsLogPath } = options

  return {
    async processEmail(request, { requestId, signal } = {}) {
      const parsed = TriageRequestSchema.safeParse(request)
      if (!parsed.success) {
        throw new InvalidRequestError(
          parsed.error.issues.map((issue) => issue.message).join('; ')
        )
      }

      const { emailText, priority, metadata } = parsed.data
      const state = await pipeline.run(emailText, {
        requestId,
        priority,
        metadata,
        signal,
      })

      if (state.error) {
        await log('error', 'email processing failed', {
          workflow: 'triage',
          requestId: state.requestId,
          stage: state.error.stage,
          error: state.error.message,
        })
        throw new PipelineFailure({
          requestId: state.requestId,
          stage: state.error.stage,
          message: state.error.message,
        })
      }

      return toResponse(state)
    },

    listHistory(limit = DEFAULT_HISTORY_LIMIT) {
      return history.list(limit)
    },

    getHistoryEntry(requestId) {
      return history.get(requestId)
    },

    deleteHistoryEntry(requestId) {
      return history.delete(requestId)
    },

    clearHistory() {
      return history.clear()
    },

    getStats() {
      return history.stats()
    },

    async getMetricsSummary() {
      if (!metricsLogPath) return null
      return summarizeMetrics(await readMetricsLog(metricsLogPath))
    },

    flush() {
      return pipeline.flush()
    },
  }
}
