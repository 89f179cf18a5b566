import { StageAbortedError, StageTimeoutError } from './errors'
import type { StageName } from './types'

export const MAX_BACKOFF_MS = 30000

export interface RetryOptions {
  /** Extra attempts after the first one (0 = no retry) */
  maxRetries?: number
  baseDelayMs?: number
  /** No further attempts once aborted */
  signal?: AbortSignal
  onRetry?: (attempt: number, error: unknown) => void
}

export function backoffDelay(attempt: number, baseDelayMs = 1000): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS)
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Retry an async call with capped exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  { maxRetries = 0, baseDelayMs = 1000, signal, onRetry }: RetryOptions = {}
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxRetries || signal?.aborted) throw error
      onRetry?.(attempt + 1, error)
      await sleep(backoffDelay(attempt, baseDelayMs))
    }
  }
}

/**
 * Reject with StageTimeoutError if the call has not settled within `ms`.
 * The timer is cleared either way.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  stage: StageName
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new StageTimeoutError({ stage, timeoutMs: ms })),
      ms
    )
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Reject with StageAbortedError once `signal` aborts, or straight away when it
 * already has.
 */
export async function withAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  stage: StageName
): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) throw new StageAbortedError({ stage })

  let onAbort: (() => void) | undefined
  const abortPromise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new StageAbortedError({ stage }))
    signal.addEventListener('abort', onAbort, { once: true })
  })

  try {
    return await Promise.race([promise, abortPromise])
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort)
  }
}
