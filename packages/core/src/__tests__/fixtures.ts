/**
 * Terminal pipeline states shared by the metrics, history and service tests.
 */

import type { PipelineState } from '../pipeline/types'

export function makeDecidedState(
  overrides: Partial<PipelineState> = {}
): PipelineState {
  return {
    requestId: 'req-1',
    emailText: 'Hi, we need inventory forecasting that plugs into our ERP.',
    stage: 'decided',
    classification: {
      intent: 'sales_inquiry',
      urgency: 'medium',
      companyName: 'Northwind Traders',
      requirements: ['inventory forecasting', 'ERP integration'],
      confidence: 0.8,
    },
    research: {
      companyName: 'Northwind Traders',
      industry: 'retail',
      companySize: 'SME',
      products: ['groceries'],
      relevance: 'Seasonal demand',
      keyInsights: [],
      confidence: 0.7,
    },
    retrieval: {
      query: 'inventory forecasting ERP integration',
      documents: [
        {
          title: 'Grocery forecasting',
          content: 'inventory forecasting for a retail chain',
          category: 'case_study',
          industry: 'retail',
          tags: ['forecasting'],
          relevanceScore: 0.6,
          relevanceExplanation: 'Relevant to retail industry',
        },
      ],
      totalFound: 1,
      strategy: 'hybrid',
    },
    draft: {
      subject: 'Inventory forecasting for Northwind',
      body: 'Thanks Dana. Our inventory forecasting plugs into your ERP.',
      tone: 'professional',
      keyPoints: ['inventory forecasting'],
    },
    quality: {
      approved: true,
      confidence: 0.95,
      issues: [
        {
          severity: 'low',
          description: 'Could mention pricing',
          suggestion: 'Add a pricing line',
        },
      ],
      strengths: ['Specific', 'Clear next step'],
      overallAssessment: 'Ready to send',
      requirementsAddressed: ['inventory forecasting', 'ERP integration'],
      requirementsMissed: [],
    },
    qualitySource: 'primary',
    decision: {
      action: 'auto_send',
      reasoning: 'High confidence',
      priority: 'low',
      estimatedReviewTime: '0 minutes',
      confidenceBreakdown: {
        qualityConfidence: 0.95,
        classificationConfidence: 0.8,
        noCriticalIssues: 1,
        allRequirementsMet: 1,
      },
      overallConfidence: 0.94,
      adjustedConfidence: 0.94,
    },
    steps: [],
    startedAt: '2026-01-05T10:00:00.000Z',
    totalDurationMs: 1200,
    ...overrides,
  }
}

export function makeFailedState(
  overrides: Partial<PipelineState> = {}
): PipelineState {
  return {
    requestId: 'req-failed',
    emailText: 'Hello?',
    stage: 'error',
    classification: {
      intent: 'other',
      urgency: 'low',
      companyName: 'Unknown',
      requirements: [],
      confidence: 0.4,
    },
    error: { stage: 'research', message: 'Research failed: timeout' },
    steps: [],
    startedAt: '2026-01-05T10:00:00.000Z',
    totalDurationMs: 300,
    ...overrides,
  }
}
