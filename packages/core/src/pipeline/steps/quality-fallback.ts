/**
 * Rule-based quality check
 *
 * Grades a draft without any model call. Used only when the primary validator
 * is missing or fails, so every request still gets an assessment.
 */

import type { DraftResponse, QualityAssessment, QualityIssue } from '../types'

// ============================================================================
// Rules
// ============================================================================

export const MAX_WORDS = 500
export const MIN_WORDS = 50

/** Requirement tokens shorter than this many code points are ignored */
const MIN_TOKEN_LENGTH = 4

const DEFAULT_STRENGTH = 'Response generated successfully'

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

/**
 * A requirement counts as addressed when any of its tokens longer than three
 * code points appears, case-insensitively, anywhere in the body.
 */
export function isRequirementAddressed(
  requirement: string,
  body: string
): boolean {
  const haystack = body.toLowerCase()
  return requirement
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => [...token].length >= MIN_TOKEN_LENGTH)
    .some((token) => haystack.includes(token))
}

function scoreIssues(issues: QualityIssue[]): {
  confidence: number
  approved: boolean
} {
  const high = issues.filter((issue) => issue.severity === 'high').length
  const medium = issues.filter((issue) => issue.severity === 'medium').length

  if (high > 0) return { confidence: 0.5, approved: false }
  if (medium > 1) return { confidence: 0.7, approved: false }
  if (medium === 1) return { confidence: 0.8, approved: true }
  return { confidence: 0.9, approved: true }
}

// ============================================================================
// Main
// ============================================================================

export function assessQuality(
  draft: DraftResponse,
  requirements: string[]
): QualityAssessment {
  const issues: QualityIssue[] = []
  const strengths: string[] = []

  const wordCount = countWords(draft.body)
  if (wordCount > MAX_WORDS) {
    issues.push({
      severity: 'medium',
      description: `Response is too long (>${MAX_WORDS} words)`,
      suggestion: 'Condense the content to be more concise',
    })
  } else if (wordCount < MIN_WORDS) {
    issues.push({
      severity: 'high',
      description: `Response is too short (<${MIN_WORDS} words)`,
      suggestion: 'Provide more detail and context',
    })
  } else {
    strengths.push('Appropriate length')
  }

  if (!draft.subject) {
    issues.push({
      severity: 'high',
      description: 'Missing email subject',
      suggestion: 'Add a clear subject line',
    })
  } else {
    strengths.push('Has clear subject line')
  }

  const requirementsAddressed: string[] = []
  const requirementsMissed: string[] = []
  for (const requirement of requirements) {
    if (isRequirementAddressed(requirement, draft.body)) {
      requirementsAddressed.push(requirement)
    } else {
      requirementsMissed.push(requirement)
    }
  }

  if (requirementsMissed.length > 0) {
    issues.push({
      severity: 'high',
      description: `Missing requirements: ${requirementsMissed.slice(0, 2).join(', ')}`,
      suggestion: 'Address all customer requirements explicitly',
    })
  } else {
    strengths.push('All requirements addressed')
  }

  const { confidence, approved } = scoreIssues(issues)

  return {
    approved,
    confidence,
    issues,
    strengths: strengths.length > 0 ? strengths : [DEFAULT_STRENGTH],
    overallAssessment: `Fallback quality check: ${approved ? 'Approved' : 'Needs revision'}. ${issues.length} issues found.`,
    requirementsAddressed,
    requirementsMissed,
  }
}
