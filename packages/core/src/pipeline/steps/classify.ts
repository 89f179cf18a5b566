/**
 * Step 1: CLASSIFY
 *
 * Reads the raw email and extracts intent, urgency, the sender's company and
 * the requirements every later stage works from.
 */

import { generateObject } from 'ai'
import { DEFAULT_MODELS } from '../../config/env'
import { log } from '../../observability/axiom'
import type { Classifier } from '../collaborators'
import { ClassificationError, errorMessage } from '../errors'
import { classificationSchema } from '../schemas'
import type { Classification } from '../types'

const CLASSIFY_PROMPT = `You are an email classifier for a B2B solutions company. Analyze the inbound email.

Extract:
1. intent: sales_inquiry, support_request, partnership, or other
2. urgency: high, medium, or low
3. companyName: the formal company name, usually in the signature or sender (e.g. names ending in GmbH, AG, Inc). If there is none, use the sender's full name.
4. requirements: the concrete requirements or questions, mostly from the body, in the order they appear
5. confidence: how sure you are of this classification (0.0-1.0)

Only extract what the email actually says.`

export interface ClassifyOptions {
  model?: string
}

export function createLlmClassifier(options: ClassifyOptions = {}): Classifier {
  const { model = DEFAULT_MODELS.classify } = options

  return {
    async classify(emailText: string): Promise<Classification> {
      const startTime = Date.now()

      try {
        const { object } = await generateObject({
          model,
          schema: classificationSchema,
          system: CLASSIFY_PROMPT,
          prompt: `Classify this email:\n\n${emailText}`,
        })

        await log('debug', 'classify completed', {
          workflow: 'pipeline',
          step: 'classify',
          model,
          intent: object.intent,
          urgency: object.urgency,
          requirementCount: object.requirements.length,
          confidence: object.confidence,
          durationMs: Date.now() - startTime,
        })

        return object
      } catch (error) {
        throw new ClassificationError({
          message: `Classification failed: ${errorMessage(error)}`,
          cause: error,
        })
      }
    },
  }
}
