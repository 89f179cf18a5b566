/**
 * Step 6: DECIDE
 *
 * Folds the quality assessment and classification into one confidence value,
 * adjusts it for urgency and maps it to an action. Pure and deterministic.
 */

import { ContractViolation } from '../errors'
import {
  AUTO_SEND_THRESHOLD,
  CONFIDENCE_WEIGHTS,
  HUMAN_REVIEW_THRESHOLD,
  REVIEW_TIME_ESTIMATES,
  getUrgencyMultiplier,
} from '../thresholds'
import type {
  Classification,
  ConfidenceBreakdown,
  Decision,
  DecisionAction,
  Priority,
  QualityAssessment,
} from '../types'

export function hasCriticalIssues(quality: QualityAssessment): boolean {
  return quality.issues.some((issue) => issue.severity === 'high')
}

export function computeConfidenceBreakdown(
  quality: QualityAssessment,
  classification: Classification
): ConfidenceBreakdown {
  return {
    qualityConfidence: quality.confidence,
    classificationConfidence: classification.confidence,
    noCriticalIssues: hasCriticalIssues(quality) ? 0 : 1,
    allRequirementsMet: quality.requirementsMissed.length === 0 ? 1 : 0.5,
  }
}

export function weighConfidence(breakdown: ConfidenceBreakdown): number {
  return (
    breakdown.qualityConfidence * CONFIDENCE_WEIGHTS.qualityConfidence +
    breakdown.classificationConfidence *
      CONFIDENCE_WEIGHTS.classificationConfidence +
    breakdown.noCriticalIssues * CONFIDENCE_WEIGHTS.noCriticalIssues +
    breakdown.allRequirementsMet * CONFIDENCE_WEIGHTS.allRequirementsMet
  )
}

/**
 * Review priority: urgent emails first, then by the worst issue severity.
 */
function reviewPriority(
  quality: QualityAssessment,
  classification: Classification
): Priority {
  if (classification.urgency === 'high') return 'high'

  const severities = quality.issues.map((issue) => issue.severity)
  if (severities.includes('high')) return 'high'
  if (severities.includes('medium')) return 'medium'
  return 'low'
}

function buildReasoning(
  action: DecisionAction,
  overall: number,
  quality: QualityAssessment,
  classification: Classification
): string {
  const confidence = overall.toFixed(2)
  const context = `Intent: ${classification.intent}, Urgency: ${classification.urgency}.`

  switch (action) {
    case 'auto_send':
      return `High confidence (${confidence}) response with no critical issues. All requirements addressed. Quality check passed. ${context} Safe to send automatically.`
    case 'human_review': {
      const issueSummary =
        quality.issues.length > 0
          ? `${quality.issues.length} minor issues found`
          : 'no issues'
      return `Moderate confidence (${confidence}). Response quality is good but should be reviewed by human. ${issueSummary}. ${context} Quick review recommended before sending.`
    }
    case 'manual_handle':
      return `Low confidence (${confidence}) or critical issues found. Quality checker found: ${quality.issues.length} issues. Requirements missed: ${quality.requirementsMissed.length}. ${context} Requires manual handling by experienced team member.`
  }
}

export function decide(
  quality: QualityAssessment | undefined,
  classification: Classification | undefined
): Decision {
  if (!quality) {
    throw new ContractViolation('decide requires a quality assessment')
  }
  if (!classification) {
    throw new ContractViolation('decide requires a classification')
  }

  const confidenceBreakdown = computeConfidenceBreakdown(quality, classification)
  const overallConfidence = weighConfidence(confidenceBreakdown)
  const adjustedConfidence =
    overallConfidence * getUrgencyMultiplier(classification.urgency)

  let action: DecisionAction
  let priority: Priority
  if (adjustedConfidence >= AUTO_SEND_THRESHOLD && quality.approved) {
    action = 'auto_send'
    priority = 'low'
  } else if (adjustedConfidence >= HUMAN_REVIEW_THRESHOLD) {
    action = 'human_review'
    priority = reviewPriority(quality, classification)
  } else {
    action = 'manual_handle'
    priority = 'high'
  }

  return {
    action,
    reasoning: buildReasoning(
      action,
      overallConfidence,
      quality,
      classification
    ),
    priority,
    estimatedReviewTime: REVIEW_TIME_ESTIMATES[action],
    confidenceBreakdown,
    overallConfidence,
    adjustedConfidence,
  }
}
