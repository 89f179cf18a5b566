import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

export const DEFAULT_MODELS = {
  classify: 'anthropic/claude-haiku-4-5',
  research: 'anthropic/claude-sonnet-4-5',
  draft: 'anthropic/claude-sonnet-4-5',
  validate: 'anthropic/claude-haiku-4-5',
} as const

/**
 * Skip validation under tests or when explicitly asked. Defaults are not
 * applied when skipped, so read settings through {@link loadConfig}.
 */
const shouldSkipValidation =
  typeof process !== 'undefined' &&
  (!!process.env.VITEST ||
    process.env.NODE_ENV === 'test' ||
    !!process.env.SKIP_ENV_VALIDATION)

export const env = createEnv({
  server: {
    AXIOM_TOKEN: z.string().optional(),
    AXIOM_DATASET: z.string().default('inbox-triage'),
    UPSTASH_VECTOR_URL: z.string().url().optional(),
    UPSTASH_VECTOR_TOKEN: z.string().optional(),
    TAVILY_API_KEY: z.string().optional(),
    CLASSIFY_MODEL: z.string().default(DEFAULT_MODELS.classify),
    RESEARCH_MODEL: z.string().default(DEFAULT_MODELS.research),
    DRAFT_MODEL: z.string().default(DEFAULT_MODELS.draft),
    VALIDATE_MODEL: z.string().default(DEFAULT_MODELS.validate),
    METRICS_LOG_PATH: z.string().default('.inbox-triage/metrics.jsonl'),
    RETRIEVAL_LIMIT: z.coerce.number().int().positive().default(2),
    STAGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    MAX_RETRIES: z.coerce.number().int().min(0).default(0),
  },
  runtimeEnv: process.env,
  skipValidation: shouldSkipValidation,
})

export interface TriageConfig {
  models: {
    classify: string
    research: string
    draft: string
    validate: string
  }
  tavilyApiKey?: string
  metricsLogPath: string
  retrievalLimit: number
  stageTimeoutMs?: number
  maxRetries: number
}

export function loadConfig(): TriageConfig {
  return {
    models: {
      classify: env.CLASSIFY_MODEL ?? DEFAULT_MODELS.classify,
      research: env.RESEARCH_MODEL ?? DEFAULT_MODELS.research,
      draft: env.DRAFT_MODEL ?? DEFAULT_MODELS.draft,
      validate: env.VALIDATE_MODEL ?? DEFAULT_MODELS.validate,
    },
    tavilyApiKey: env.TAVILY_API_KEY,
    metricsLogPath: env.METRICS_LOG_PATH ?? '.inbox-triage/metrics.jsonl',
    retrievalLimit: Number(env.RETRIEVAL_LIMIT ?? 2),
    stageTimeoutMs:
      env.STAGE_TIMEOUT_MS === undefined
        ? undefined
        : Number(env.STAGE_TIMEOUT_MS),
    maxRetries: Number(env.MAX_RETRIES ?? 0),
  }
}
