/**
 * Step 5: VALIDATE
 *
 * A model reviews the draft against the original email and the stated
 * requirements. When that reviewer is missing or fails, the rule-based check
 * in ./quality-fallback grades the draft instead. This stage never halts the
 * pipeline.
 */

import { generateObject } from 'ai'
import { DEFAULT_MODELS } from '../../config/env'
import type { QualityValidator } from '../collaborators'
import { ValidationUnavailable, errorMessage } from '../errors'
import { qualitySchema } from '../schemas'
import type {
  Classification,
  DraftResponse,
  QualityAssessment,
} from '../types'

const VALIDATE_PROMPT = `You are a quality assurance specialist reviewing outbound email replies.

Check that:
1. Every customer requirement is addressed
2. The tone is professional and helpful
3. There are no factual errors or unsupported claims
4. A clear call to action is included
5. The email is concise (under 400 words)
6. Grammar and spelling are correct
7. The reply is personalized, not generic

Confidence bands:
- above 0.85: ready to send, minor or no issues
- 0.70-0.85: needs minor revisions
- below 0.70: needs significant revisions

Output rules:
- issues: [] when there are none, never "None" or null
- strengths: at least 2 items
- requirementsAddressed / requirementsMissed: the requirement text itself; [] when empty

Be thorough but fair.`

export function buildValidatePrompt(
  draft: DraftResponse,
  classification: Classification,
  originalEmail: string
): string {
  const requirements = classification.requirements
    .map((req, i) => `${i + 1}. ${req}`)
    .join('\n')

  return `Review this email reply.

ORIGINAL EMAIL:
${originalEmail}

CUSTOMER REQUIREMENTS (check each one):
${requirements || '(none stated)'}

GENERATED REPLY:
Subject: ${draft.subject}

${draft.body}`
}

export interface ValidateOptions {
  model?: string
}

export function createLlmValidator(
  options: ValidateOptions = {}
): QualityValidator {
  const { model = DEFAULT_MODELS.validate } = options

  return {
    async validate(
      draft: DraftResponse,
      classification: Classification,
      originalEmail: string
    ): Promise<QualityAssessment> {
      const { object } = await generateObject({
        model,
        schema: qualitySchema,
        system: VALIDATE_PROMPT,
        prompt: buildValidatePrompt(draft, classification, originalEmail),
      })

      return object
    },
  }
}

// ============================================================================
// Result-typed attempt
// ============================================================================

export type ValidationResult =
  | { ok: true; assessment: QualityAssessment }
  | { ok: false; reason: ValidationUnavailable }

/**
 * Run the primary validator without letting it throw.
 */
export async function tryValidate(
  validator: QualityValidator | undefined,
  draft: DraftResponse,
  classification: Classification,
  originalEmail: string
): Promise<ValidationResult> {
  if (!validator) {
    return {
      ok: false,
      reason: new ValidationUnavailable('No primary validator configured'),
    }
  }

  try {
    const assessment = await validator.validate(
      draft,
      classification,
      originalEmail
    )
    return { ok: true, assessment }
  } catch (error) {
    return {
      ok: false,
      reason: new ValidationUnavailable(
        `Primary validator failed: ${errorMessage(error)}`,
        error
      ),
    }
  }
}
