import { describe, expect, it } from 'vitest'
import { ContractViolation } from '../errors'
import type { Classification, QualityAssessment } from '../types'
import { decide, hasCriticalIssues } from './decide'

// ============================================================================
// Test helpers
// ============================================================================

function makeQuality(
  overrides: Partial<QualityAssessment> = {}
): QualityAssessment {
  return {
    approved: true,
    confidence: 0.95,
    issues: [],
    strengths: ['Clear answer'],
    overallAssessment: 'Looks good',
    requirementsAddressed: ['pricing'],
    requirementsMissed: [],
    ...overrides,
  }
}

function makeClassification(
  overrides: Partial<Classification> = {}
): Classification {
  return {
    intent: 'sales_inquiry',
    urgency: 'medium',
    companyName: 'Northwind Traders',
    requirements: ['pricing'],
    confidence: 0.8,
    ...overrides,
  }
}

describe('decide', () => {
  it('auto-sends a confident, approved response', () => {
    const decision = decide(makeQuality(), makeClassification())

    expect(decision.overallConfidence).toBeCloseTo(0.94, 10)
    expect(decision.adjustedConfidence).toBeCloseTo(0.94, 10)
    expect(decision.action).toBe('auto_send')
    expect(decision.priority).toBe('low')
    expect(decision.estimatedReviewTime).toBe('0 minutes')
    expect(decision.reasoning).toBe(
      'High confidence (0.94) response with no critical issues. All requirements addressed. Quality check passed. Intent: sales_inquiry, Urgency: medium. Safe to send automatically.'
    )
  })

  it('sends urgent mail to human review when urgency pulls it under the bar', () => {
    const decision = decide(
      makeQuality(),
      makeClassification({ urgency: 'high' })
    )

    expect(decision.adjustedConfidence).toBeCloseTo(0.893, 10)
    expect(decision.action).toBe('human_review')
    expect(decision.priority).toBe('high')
    expect(decision.estimatedReviewTime).toBe('2-3 minutes')
    expect(decision.reasoning).toBe(
      'Moderate confidence (0.94). Response quality is good but should be reviewed by human. no issues. Intent: sales_inquiry, Urgency: high. Quick review recommended before sending.'
    )
  })

  it('hands low-confidence responses with critical issues to a person', () => {
    const decision = decide(
      makeQuality({
        confidence: 0.4,
        approved: false,
        issues: [
          {
            severity: 'high',
            description: 'Quotes the wrong price',
            suggestion: 'Use the current price list',
          },
        ],
      }),
      makeClassification({ confidence: 0.9 })
    )

    expect(decision.confidenceBreakdown.noCriticalIssues).toBe(0)
    expect(decision.overallConfidence).toBeCloseTo(0.54, 10)
    expect(decision.action).toBe('manual_handle')
    expect(decision.priority).toBe('high')
    expect(decision.estimatedReviewTime).toBe('10-15 minutes')
    expect(decision.reasoning).toBe(
      'Low confidence (0.54) or critical issues found. Quality checker found: 1 issues. Requirements missed: 0. Intent: sales_inquiry, Urgency: medium. Requires manual handling by experienced team member.'
    )
  })

  it('stays manual for low urgency when the quality is poor', () => {
    const decision = decide(
      makeQuality({
        confidence: 0.4,
        approved: false,
        issues: [
          { severity: 'high', description: 'Off topic', suggestion: 'Rewrite' },
        ],
      }),
      makeClassification({ confidence: 0.9, urgency: 'low' })
    )

    expect(decision.action).toBe('manual_handle')
    expect(decision.priority).toBe('high')
  })

  it('never auto-sends an unapproved response', () => {
    const decision = decide(
      makeQuality({ approved: false, confidence: 1 }),
      makeClassification({ confidence: 1, urgency: 'low' })
    )

    expect(decision.adjustedConfidence).toBeGreaterThan(0.9)
    expect(decision.action).toBe('human_review')
  })

  it('halves the requirements factor when any are missed', () => {
    const decision = decide(
      makeQuality({ requirementsMissed: ['integrations'] }),
      makeClassification()
    )

    expect(decision.confidenceBreakdown).toEqual({
      qualityConfidence: 0.95,
      classificationConfidence: 0.8,
      noCriticalIssues: 1,
      allRequirementsMet: 0.5,
    })
    expect(decision.overallConfidence).toBeCloseTo(0.84, 10)
    expect(decision.action).toBe('human_review')
  })

  it('ranks review priority by the worst issue severity', () => {
    const mediumIssue = {
      severity: 'medium' as const,
      description: 'Slightly long',
      suggestion: 'Trim',
    }
    const decision = decide(
      makeQuality({ approved: false, issues: [mediumIssue] }),
      makeClassification()
    )

    expect(decision.action).toBe('human_review')
    expect(decision.priority).toBe('medium')
    expect(decision.reasoning).toContain('1 minor issues found.')
  })

  it('is pure', () => {
    const quality = makeQuality()
    const classification = makeClassification()

    expect(decide(quality, classification)).toEqual(
      decide(quality, classification)
    )
  })

  it('rejects missing inputs', () => {
    expect(() => decide(undefined, makeClassification())).toThrow(
      ContractViolation
    )
    expect(() => decide(makeQuality(), undefined)).toThrow(ContractViolation)
  })
})

describe('hasCriticalIssues', () => {
  it('only counts high severity', () => {
    expect(
      hasCriticalIssues(
        makeQuality({
          issues: [{ severity: 'medium', description: 'x', suggestion: 'y' }],
        })
      )
    ).toBe(false)
  })
})
