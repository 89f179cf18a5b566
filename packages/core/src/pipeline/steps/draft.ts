/**
 * Step 4: DRAFT
 *
 * Writes the reply from the classification, the company profile and the
 * best retrieved reference.
 */

import { generateObject } from 'ai'
import { DEFAULT_MODELS } from '../../config/env'
import { log } from '../../observability/axiom'
import type { Drafter } from '../collaborators'
import { DraftError, errorMessage } from '../errors'
import { draftSchema } from '../schemas'
import type {
  Classification,
  DraftResponse,
  RankedResults,
  ResearchProfile,
} from '../types'

const DRAFT_PROMPT = `You are a business development representative replying to inbound email.

Guidelines:
- Keep replies 200-300 words
- Be professional and helpful
- Reference the relevant past project when one is given
- Address every stated requirement explicitly
- Close with a clear next step
- Write a complete, ready-to-send email`

const SNIPPET_LENGTH = 180

export function buildDraftPrompt(
  classification: Classification,
  research: ResearchProfile,
  retrieval: RankedResults,
  originalEmail: string
): string {
  const references = retrieval.documents
    .slice(0, 2)
    .map(
      (doc, i) =>
        `${i + 1}. ${doc.title}: ${doc.content.slice(0, SNIPPET_LENGTH).replace(/\n/g, ' ')}`
    )
    .join('\n')

  return `Write a reply to this email.

TO: ${classification.companyName}
THEIR NEEDS: ${classification.requirements.join(', ') || '(none stated)'}
INDUSTRY: ${research.industry}
RELEVANCE: ${research.relevance}
${references ? `RELEVANT EXPERIENCE:\n${references}\n` : ''}
ORIGINAL EMAIL:
${originalEmail}`
}

export interface DraftOptions {
  model?: string
}

export function createLlmDrafter(options: DraftOptions = {}): Drafter {
  const { model = DEFAULT_MODELS.draft } = options

  return {
    async draft(
      classification: Classification,
      research: ResearchProfile,
      retrieval: RankedResults,
      originalEmail: string
    ): Promise<DraftResponse> {
      const startTime = Date.now()

      try {
        const { object } = await generateObject({
          model,
          schema: draftSchema,
          system: DRAFT_PROMPT,
          prompt: buildDraftPrompt(
            classification,
            research,
            retrieval,
            originalEmail
          ),
        })

        const keyPoints =
          object.keyPoints.length > 0
            ? object.keyPoints
            : classification.requirements.slice(0, 2)

        await log('debug', 'draft completed', {
          workflow: 'pipeline',
          step: 'draft',
          model,
          wordCount: object.body.split(/\s+/).filter(Boolean).length,
          keyPointCount: keyPoints.length,
          durationMs: Date.now() - startTime,
        })

        return { ...object, keyPoints }
      } catch (error) {
        throw new DraftError({
          message: `Draft failed: ${errorMessage(error)}`,
          cause: error,
        })
      }
    },
  }
}
