import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

/**
 * Check if we should skip validation.
 * Skip during:
 * - Tests (VITEST, NODE_ENV=test)
 * - CI builds
 * - Explicit skip
 * - No DATABASE_URL available (the CLI falls back to in-memory history and
 *   getDb() fails at runtime with a clear error)
 */
const shouldSkipValidation =
  typeof process !== 'undefined' &&
  (!!process.env.VITEST ||
    process.env.NODE_ENV === 'test' ||
    !!process.env.CI ||
    !!process.env.SKIP_ENV_VALIDATION ||
    !process.env.DATABASE_URL)

export const env = createEnv({
  server: {
    DATABASE_URL: z.string().url().optional(),
  },
  runtimeEnv: process.env,
  skipValidation: shouldSkipValidation,
})
