import { InvalidRequestError, PipelineFailure } from '@inbox-triage/core'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  network: 11,
  database: 12,
  pipeline: 13,
  cancelled: 130,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  debugMessage?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string
  debugMessage?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    debugMessage,
    cause,
  }: CLIErrorOptions) {
    super(debugMessage ?? userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
    this.debugMessage = debugMessage
  }
}

export class UsageError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.usage })
    this.name = 'UsageError'
  }
}

export class NetworkError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.network })
    this.name = 'NetworkError'
  }
}

export class DatabaseError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.database })
    this.name = 'DatabaseError'
  }
}

export class PipelineRunError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.pipeline })
    this.name = 'PipelineRunError'
  }
}

/**
 * Map anything a command throws onto a CLIError. Core failures keep their
 * own exit codes; everything else gets `message` and `suggestion`.
 */
export function toCLIError(
  error: unknown,
  message: string,
  suggestion?: string
): CLIError {
  if (error instanceof CLIError) return error

  if (error instanceof PipelineFailure) {
    return new PipelineRunError({
      userMessage: `Pipeline failed at ${error.stage}: ${error.message}`,
      suggestion: `Re-run with --verbose, or check logs for request ${error.requestId}.`,
      cause: error,
    })
  }

  if (error instanceof InvalidRequestError) {
    return new UsageError({ userMessage: error.message, cause: error })
  }

  return new CLIError({
    userMessage: message,
    suggestion,
    debugMessage: error instanceof Error ? error.message : undefined,
    cause: error,
  })
}

export function formatError(error: unknown): string {
  if (error instanceof CLIError) {
    if (error.suggestion) {
      return `${error.userMessage}\nSuggestion: ${error.suggestion}`
    }

    return error.userMessage
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred.'
  }

  return 'An unexpected error occurred.'
}
