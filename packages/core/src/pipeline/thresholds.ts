import type { DecisionAction, Urgency } from './types'

/**
 * Weights of the four confidence factors. They sum to 1.
 */
export const CONFIDENCE_WEIGHTS = {
  qualityConfidence: 0.4,
  classificationConfidence: 0.2,
  noCriticalIssues: 0.2,
  allRequirementsMet: 0.2,
} as const

export const URGENCY_MULTIPLIERS: Record<Urgency, number> = {
  high: 0.95,
  medium: 1.0,
  low: 1.05,
}

export const AUTO_SEND_THRESHOLD = 0.9
export const HUMAN_REVIEW_THRESHOLD = 0.75

export const REVIEW_TIME_ESTIMATES: Record<DecisionAction, string> = {
  auto_send: '0 minutes',
  human_review: '2-3 minutes',
  manual_handle: '10-15 minutes',
}

export function getUrgencyMultiplier(urgency?: Urgency): number {
  if (!urgency) return URGENCY_MULTIPLIERS.medium
  return URGENCY_MULTIPLIERS[urgency] ?? URGENCY_MULTIPLIERS.medium
}
