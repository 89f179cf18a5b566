import type {
  Classification,
  Decision,
  PipelineState,
  RankedResults,
} from '../pipeline/types'
import type { HistoryStats, NewHistoryEntry, ResponseMetadata } from './types'

function round(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export function buildResponseMetadata(
  classification: Classification,
  decision: Decision,
  retrieval: RankedResults | undefined
): ResponseMetadata {
  return {
    intent: classification.intent,
    company: classification.companyName,
    urgency: classification.urgency,
    priority: decision.priority,
    ragDocumentCount: retrieval?.documents.length ?? 0,
  }
}

/**
 * Project a pipeline state onto a history entry. Only decided states have
 * everything an entry needs; anything else yields null.
 */
export function entryFromState(
  state: Readonly<PipelineState>
): NewHistoryEntry | null {
  const { classification, decision, quality, draft, retrieval } = state
  if (
    state.stage !== 'decided' ||
    !classification ||
    !decision ||
    !quality ||
    !draft
  ) {
    return null
  }

  const metadata = buildResponseMetadata(classification, decision, retrieval)

  return {
    requestId: state.requestId,
    emailText: state.emailText,
    decision: decision.action,
    confidence: quality.confidence,
    subject: draft.subject,
    body: draft.body,
    processingTimeMs: state.totalDurationMs,
    qualityApproved: quality.approved,
    metadata: state.metadata
      ? { ...metadata, request: state.metadata }
      : { ...metadata },
  }
}

export function toHistoryStats(totals: {
  total: number
  confidenceSum: number
  processingTimeSum: number
  approvedCount: number
}): HistoryStats {
  const { total, confidenceSum, processingTimeSum, approvedCount } = totals
  if (total === 0) {
    return {
      totalProcessed: 0,
      avgConfidence: 0,
      avgProcessingTimeMs: 0,
      qualityApprovalRate: 0,
    }
  }

  return {
    totalProcessed: total,
    avgConfidence: round(confidenceSum / total, 2),
    avgProcessingTimeMs: round(processingTimeSum / total, 2),
    qualityApprovalRate: round((approvedCount / total) * 100, 1),
  }
}
