/**
 * Structured-output schemas for the model-backed stages.
 *
 * Closed variants are checked here, at the model boundary, and trusted
 * everywhere downstream.
 */

import { z } from 'zod'
import { INTENTS, SEVERITIES, URGENCIES } from './types'

const confidenceSchema = z.coerce.number().finite().min(0).max(1)

/**
 * Models sometimes answer "None", null, or a comma-separated string where a
 * list is expected.
 */
export function normalizeList(value: unknown): unknown {
  if (value === null || value === undefined) return []
  if (value === 'None' || value === 'null') return []
  if (typeof value === 'string') {
    if (value.includes(',')) return value.split(',').map((item) => item.trim())
    return value ? [value] : []
  }
  return value
}

const stringListSchema = z.preprocess(normalizeList, z.array(z.string()))

export const classificationSchema = z.object({
  intent: z.enum(INTENTS).describe('Primary intent of the email'),
  urgency: z.enum(URGENCIES).describe('Urgency level of the email'),
  companyName: z
    .string()
    .describe(
      'Formal company name from the signature or sender; the sender full name if none'
    ),
  requirements: z
    .array(z.string())
    .describe('Key requirements or questions, in the order they appear'),
  confidence: confidenceSchema.describe('Confidence in this classification'),
})

export const researchSchema = z.object({
  companyName: z.string(),
  industry: z.string(),
  companySize: z.string().describe("e.g. 'Enterprise', 'SME', 'Startup'"),
  products: z.array(z.string()).describe('Main products and services'),
  relevance: z.string().describe('How our offering is relevant to them'),
  keyInsights: z
    .array(z.string())
    .describe('Facts worth mentioning in the reply'),
  confidence: confidenceSchema,
})

export const draftSchema = z.object({
  subject: z.string().describe('Subject line of the email'),
  body: z.string().describe('Complete email body, about 200-300 words'),
  tone: z.string().default('professional'),
  keyPoints: stringListSchema.describe('Requirements the email covers'),
})

export const qualityIssueSchema = z.object({
  severity: z.enum(SEVERITIES),
  description: z.string().describe('What is wrong'),
  suggestion: z.string().describe('How to fix it'),
})

export const qualitySchema = z.object({
  approved: z.boolean().describe('Whether the response passes review'),
  confidence: confidenceSchema.describe('Confidence in the response quality'),
  issues: z.preprocess(
    (value) => (Array.isArray(value) ? value : []),
    z.array(qualityIssueSchema)
  ),
  strengths: stringListSchema,
  overallAssessment: z.string(),
  requirementsAddressed: stringListSchema,
  requirementsMissed: stringListSchema,
})
