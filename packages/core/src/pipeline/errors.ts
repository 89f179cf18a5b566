/**
 * Pipeline error hierarchy
 *
 * Every collaborator failure surfaces as a {@link StageError} naming the
 * stage it came from. The orchestrator records the stage and message on the
 * pipeline state and stops.
 */

import type { StageName } from './types'

export interface StageErrorOptions {
  stage: StageName
  message: string
  cause?: unknown
}

export class StageError extends Error {
  stage: StageName

  constructor({ stage, message, cause }: StageErrorOptions) {
    super(message)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'StageError'
    this.stage = stage
  }
}

type StageSpecificOptions = Omit<StageErrorOptions, 'stage'>

export class ClassificationError extends StageError {
  constructor(options: StageSpecificOptions) {
    super({ ...options, stage: 'classify' })
    this.name = 'ClassificationError'
  }
}

export class ResearchError extends StageError {
  constructor(options: StageSpecificOptions) {
    super({ ...options, stage: 'research' })
    this.name = 'ResearchError'
  }
}

export class RetrievalError extends StageError {
  constructor(options: StageSpecificOptions) {
    super({ ...options, stage: 'retrieve' })
    this.name = 'RetrievalError'
  }
}

export class DraftError extends StageError {
  constructor(options: StageSpecificOptions) {
    super({ ...options, stage: 'draft' })
    this.name = 'DraftError'
  }
}

export class StageTimeoutError extends StageError {
  timeoutMs: number

  constructor({ stage, timeoutMs }: { stage: StageName; timeoutMs: number }) {
    super({ stage, message: `${stage} timed out after ${timeoutMs}ms` })
    this.name = 'StageTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class StageAbortedError extends StageError {
  constructor({ stage }: { stage: StageName }) {
    super({ stage, message: `${stage} aborted` })
    this.name = 'StageAbortedError'
  }
}

/**
 * Decision engine called without the inputs it needs.
 */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ContractViolation'
  }
}

/**
 * Non-fatal: returned, never thrown, when the primary validator is missing or
 * fails. Triggers the rule-based fallback.
 */
export class ValidationUnavailable extends Error {
  constructor(message: string, cause?: unknown) {
    super(message)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'ValidationUnavailable'
  }
}

/**
 * Raised by the request surface when a pipeline run ends in the error state.
 */
export class PipelineFailure extends Error {
  requestId: string
  stage: StageName

  constructor({
    requestId,
    stage,
    message,
  }: {
    requestId: string
    stage: StageName
    message: string
  }) {
    super(message)
    this.name = 'PipelineFailure'
    this.requestId = requestId
    this.stage = stage
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Coerce anything thrown inside a stage into a StageError for that stage.
 */
export function toStageError(stage: StageName, error: unknown): StageError {
  if (error instanceof StageError) return error
  return new StageError({ stage, message: errorMessage(error), cause: error })
}
