/**
 * Axiom tracing instrumentation for observability
 *
 * Wraps pipeline runs, stages, and collaborator calls with tracing. Every
 * event carries the requestId so a single email can be followed end to end.
 */

import { Axiom } from '@axiomhq/js'
import { env } from '../config/env'
import type { TraceAttributes } from './types'

let axiomClient: Axiom | null = null

const DEFAULT_DATASET = 'inbox-triage'

function getDataset(): string {
  return env.AXIOM_DATASET || DEFAULT_DATASET
}

/**
 * Initialize Axiom client (call once at app startup)
 */
export function initializeAxiom(): void {
  const token = env.AXIOM_TOKEN

  if (!token) {
    axiomClient = null
    return
  }

  axiomClient = new Axiom({ token })
}

/**
 * Flush buffered events. Call before a short-lived process exits.
 */
export async function flushAxiom(): Promise<void> {
  if (!axiomClient) return

  try {
    await axiomClient.flush()
  } catch (error) {
    console.error('[Axiom] Failed to flush:', error)
  }
}

/**
 * Wrap a function execution with tracing
 */
export async function withTracing<T>(
  name: string,
  fn: () => Promise<T>,
  attributes?: TraceAttributes
): Promise<T> {
  const startTime = Date.now()

  try {
    const result = await fn()

    await sendTrace({
      name,
      status: 'success',
      durationMs: Date.now() - startTime,
      ...attributes,
    })

    return result
  } catch (error) {
    await sendTrace({
      name,
      status: 'error',
      durationMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
      errorStack: error instanceof Error ? error.stack : undefined,
      ...attributes,
    })

    throw error
  }
}

/**
 * Send trace data to Axiom
 */
export async function sendTrace(trace: Record<string, unknown>): Promise<void> {
  if (!axiomClient) {
    // Silently skip if not initialized (e.g., in dev without AXIOM_TOKEN)
    return
  }

  try {
    axiomClient.ingest(getDataset(), {
      _time: new Date().toISOString(),
      ...trace,
    })
  } catch (error) {
    // Don't throw - observability failures shouldn't crash the app
    console.error('[Axiom] Failed to send trace:', error)
  }
}

// ============================================================================
// Generic logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Log a message to Axiom with optional metadata.
 *
 * Levels map to success/status for error-rate calculations:
 * - debug/info/warn => success=true, status='success'
 * - error           => success=false, status='error'
 */
export async function log(
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>
): Promise<void> {
  const isError = level === 'error'
  const reservedFields = {
    name: 'log',
    type: 'log',
    status: isError ? 'error' : 'success',
    success: !isError,
    level,
    message,
  }

  await sendTrace({
    ...metadata,
    ...reservedFields,
  })
}

// ============================================================================
// Pipeline traces
// ============================================================================

/**
 * Trace a single stage of a pipeline run
 */
export async function traceStage(data: {
  requestId: string
  stage: string
  success: boolean
  durationMs: number
  error?: string
}): Promise<void> {
  await sendTrace({
    name: `pipeline.${data.stage}`,
    type: 'pipeline-stage',
    status: data.success ? 'success' : 'error',
    ...data,
  })
}

/**
 * Trace a finished pipeline run - high cardinality for analytics
 */
export async function tracePipelineRun(data: {
  requestId: string
  stage: string
  durationMs: number
  intent?: string
  urgency?: string
  companyName?: string
  decision?: string
  priority?: string
  adjustedConfidence?: number
  qualityConfidence?: number
  qualitySource?: string
  documentsRetrieved?: number
  errorStage?: string
  errorMessage?: string
}): Promise<void> {
  await sendTrace({
    name: 'pipeline.run',
    type: 'pipeline',
    status: data.errorStage ? 'error' : 'success',
    ...data,
  })
}
