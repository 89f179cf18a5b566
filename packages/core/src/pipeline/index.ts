/**
 * Pipeline orchestrator
 *
 * Runs classify → research → retrieve → draft → validate → decide for one
 * email. The first failing stage halts the run; validation never fails, it
 * falls back to the rule-based check instead.
 */

import { randomUUID } from 'node:crypto'
import {
  log,
  tracePipelineRun,
  traceStage,
  withTracing,
} from '../observability/axiom'
import type { PipelineDependencies, QualityValidator } from './collaborators'
import { StageAbortedError, errorMessage, toStageError } from './errors'
import { withAbort, withRetry, withTimeout } from './retry'
import { decide } from './steps/decide'
import { assessQuality } from './steps/quality-fallback'
import { retrieve } from './steps/retrieve'
import { tryValidate } from './steps/validate'
import type {
  Classification,
  PipelineState,
  RequestOptions,
  StageName,
} from './types'

// Re-export types and steps
export * from './types'
export * from './errors'
export type {
  Classifier,
  Drafter,
  HistorySink,
  MetricsSink,
  PipelineDependencies,
  QualityValidator,
  Researcher,
  SemanticSearch,
} from './collaborators'
export { decide, computeConfidenceBreakdown, hasCriticalIssues } from './steps/decide'
export { assessQuality, isRequirementAddressed } from './steps/quality-fallback'
export {
  retrieve,
  boostCandidates,
  explainRelevance,
  type RetrieveInput,
} from './steps/retrieve'
export { tryValidate, createLlmValidator, type ValidationResult } from './steps/validate'
export { createLlmClassifier } from './steps/classify'
export { createWebResearcher } from './steps/research'
export { createLlmDrafter } from './steps/draft'
export { withAbort, withRetry, withTimeout, backoffDelay } from './retry'

// ============================================================================
// Pipeline configuration
// ============================================================================

export const DEFAULT_RETRIEVAL_LIMIT = 2

/** Email prefix used as the retrieval query when no requirements were found */
const FALLBACK_QUERY_LENGTH = 500

export interface PipelineOptions {
  retrievalLimit?: number
  /** Extra attempts per collaborator call; 0 disables retry */
  maxRetries?: number
  retryBaseDelayMs?: number
  /** Per-call timeout; unset means no timeout */
  stageTimeoutMs?: number
}

export interface Pipeline {
  run(
    emailText: string,
    options?: RequestOptions
  ): Promise<Readonly<PipelineState>>
  /** Wait for outstanding history and metrics reports */
  flush(): Promise<void>
}

export function buildRetrievalQuery(
  classification: Classification,
  emailText: string
): string {
  if (classification.requirements.length > 0) {
    return classification.requirements.join(' ')
  }
  return emailText.slice(0, FALLBACK_QUERY_LENGTH)
}

type StageOutcome<T> = { ok: true; value: T } | { ok: false }

/** Per-run values every stage call needs */
interface RunScope {
  requestId: string
  signal?: AbortSignal
}

// ============================================================================
// Main pipeline
// ============================================================================

export function createPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Pipeline {
  const {
    retrievalLimit = DEFAULT_RETRIEVAL_LIMIT,
    maxRetries = 0,
    retryBaseDelayMs = 1000,
    stageTimeoutMs,
  } = options

  const pendingReports = new Set<Promise<void>>()

  /**
   * Collaborator call with the configured timeout and retry. Each attempt is
   * traced; an aborted run stops retrying.
   */
  function call<T>(
    stage: StageName,
    scope: RunScope,
    fn: () => Promise<T>
  ): Promise<T> {
    const { requestId, signal } = scope
    const attempt = () =>
      withTracing(
        `collaborator.${stage}`,
        async () => {
          if (signal?.aborted) throw new StageAbortedError({ stage })
          const pending = stageTimeoutMs
            ? withTimeout(fn(), stageTimeoutMs, stage)
            : fn()
          return withAbort(pending, signal, stage)
        },
        { requestId, stage }
      )

    return withRetry(attempt, {
      maxRetries,
      baseDelayMs: retryBaseDelayMs,
      signal,
      onRetry: (attemptNumber, error) => {
        void log('warn', `${stage} failed, retrying`, {
          workflow: 'pipeline',
          step: stage,
          requestId,
          attempt: attemptNumber,
          error: errorMessage(error),
        })
      },
    })
  }

  /**
   * Run one stage, recording its step result. A failure moves the state to
   * `error` and the caller stops.
   */
  async function runStage<T>(
    state: PipelineState,
    stage: StageName,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>
  ): Promise<StageOutcome<T>> {
    const stageStart = Date.now()

    try {
      if (signal?.aborted) throw new StageAbortedError({ stage })
      await log('debug', `${stage} started`, {
        workflow: 'pipeline',
        step: stage,
        requestId: state.requestId,
      })

      const value = await fn()
      const durationMs = Date.now() - stageStart
      state.steps.push({ step: stage, durationMs, success: true })
      await log('debug', `${stage} completed`, {
        workflow: 'pipeline',
        step: stage,
        requestId: state.requestId,
        durationMs,
      })
      await traceStage({
        requestId: state.requestId,
        stage,
        success: true,
        durationMs,
      })
      return { ok: true, value }
    } catch (error) {
      const stageError = toStageError(stage, error)
      const durationMs = Date.now() - stageStart
      state.steps.push({
        step: stage,
        durationMs,
        success: false,
        error: stageError.message,
      })
      state.error = { stage, message: stageError.message }
      state.stage = 'error'

      await log('error', `${stage} failed, halting pipeline`, {
        workflow: 'pipeline',
        step: stage,
        requestId: state.requestId,
        errorName: stageError.name,
        error: stageError.message,
        durationMs,
      })
      await traceStage({
        requestId: state.requestId,
        stage,
        success: false,
        durationMs,
        error: stageError.message,
      })
      return { ok: false }
    }
  }

  function tracedValidator(scope: RunScope): QualityValidator | undefined {
    const validator = deps.validator
    if (!validator) return undefined
    const { requestId, signal } = scope
    return {
      validate: (draft, classification, originalEmail) =>
        withTracing(
          'collaborator.validate',
          async () => {
            const pending = validator.validate(
              draft,
              classification,
              originalEmail
            )
            return withAbort(
              stageTimeoutMs
                ? withTimeout(pending, stageTimeoutMs, 'validate')
                : pending,
              signal,
              'validate'
            )
          },
          { requestId, stage: 'validate' }
        ),
    }
  }

  async function reportToSinks(state: Readonly<PipelineState>): Promise<void> {
    const sinks: { name: string; task: () => Promise<void> }[] = []
    const { metrics, history } = deps

    if (metrics) {
      sinks.push({ name: 'metrics', task: () => metrics.record(state) })
    }
    if (history && state.stage === 'decided') {
      sinks.push({
        name: 'history',
        task: () => history.record(state.requestId, state),
      })
    }

    const results = await Promise.allSettled(
      sinks.map((sink) => Promise.resolve().then(sink.task))
    )

    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        await log('error', `${sinks[index]?.name ?? 'sink'} report failed`, {
          workflow: 'pipeline',
          requestId: state.requestId,
          error: errorMessage(result.reason),
        })
      }
    }
  }

  async function finish(
    state: PipelineState,
    startTime: number
  ): Promise<Readonly<PipelineState>> {
    state.totalDurationMs = Date.now() - startTime
    Object.freeze(state.steps)
    const final = Object.freeze(state)

    await tracePipelineRun({
      requestId: final.requestId,
      stage: final.stage,
      durationMs: final.totalDurationMs,
      intent: final.classification?.intent,
      urgency: final.classification?.urgency,
      companyName: final.classification?.companyName,
      decision: final.decision?.action,
      priority: final.decision?.priority,
      adjustedConfidence: final.decision?.adjustedConfidence,
      qualityConfidence: final.quality?.confidence,
      qualitySource: final.qualitySource,
      documentsRetrieved: final.retrieval?.documents.length,
      errorStage: final.error?.stage,
      errorMessage: final.error?.message,
    })

    // Fire-and-forget: the caller gets the state without waiting on sinks
    const report: Promise<void> = reportToSinks(final).finally(() => {
      pendingReports.delete(report)
    })
    pendingReports.add(report)

    return final
  }

  async function run(
    emailText: string,
    requestOptions: RequestOptions = {}
  ): Promise<Readonly<PipelineState>> {
    const startTime = Date.now()
    const state: PipelineState = {
      requestId: requestOptions.requestId ?? randomUUID(),
      emailText,
      priority: requestOptions.priority,
      metadata: requestOptions.metadata,
      stage: 'start',
      steps: [],
      startedAt: new Date(startTime).toISOString(),
      totalDurationMs: 0,
    }
    const { requestId } = state
    const { signal } = requestOptions
    const scope: RunScope = { requestId, signal }

    await log('info', 'pipeline started', {
      workflow: 'pipeline',
      requestId,
      emailLength: emailText.length,
      priority: state.priority,
    })

    // -------------------------------------------------------------------------
    // Step 1: Classify
    // -------------------------------------------------------------------------
    const classified = await runStage(state, 'classify', signal, () =>
      call('classify', scope, () => deps.classifier.classify(emailText))
    )
    if (!classified.ok) return finish(state, startTime)
    const classification = classified.value
    state.classification = classification
    state.stage = 'classified'

    // -------------------------------------------------------------------------
    // Step 2: Research
    // -------------------------------------------------------------------------
    const researched = await runStage(state, 'research', signal, () =>
      call('research', scope, () =>
        deps.researcher.research(
          classification.companyName,
          classification.requirements
        )
      )
    )
    if (!researched.ok) return finish(state, startTime)
    const research = researched.value
    state.research = research
    state.stage = 'researched'

    // -------------------------------------------------------------------------
    // Step 3: Retrieve
    // -------------------------------------------------------------------------
    const retrieved = await runStage(state, 'retrieve', signal, () =>
      call('retrieve', scope, () =>
        retrieve(deps.search, {
          query: buildRetrievalQuery(classification, emailText),
          industry: research.industry || undefined,
          requirements: classification.requirements,
          limit: retrievalLimit,
        })
      )
    )
    if (!retrieved.ok) return finish(state, startTime)
    const retrieval = retrieved.value
    state.retrieval = retrieval
    state.stage = 'retrieved'

    // -------------------------------------------------------------------------
    // Step 4: Draft
    // -------------------------------------------------------------------------
    const drafted = await runStage(state, 'draft', signal, () =>
      call('draft', scope, () =>
        deps.drafter.draft(classification, research, retrieval, emailText)
      )
    )
    if (!drafted.ok) return finish(state, startTime)
    const draft = drafted.value
    state.draft = draft
    state.stage = 'drafted'

    // -------------------------------------------------------------------------
    // Step 5: Validate (never halts)
    // -------------------------------------------------------------------------
    const validated = await runStage(state, 'validate', signal, async () => {
      const result = await tryValidate(
        tracedValidator(scope),
        draft,
        classification,
        emailText
      )
      if (result.ok) {
        return { assessment: result.assessment, source: 'primary' as const }
      }

      await log('warn', 'primary validation unavailable, using fallback', {
        workflow: 'pipeline',
        step: 'validate',
        requestId,
        reason: result.reason.message,
      })
      return {
        assessment: assessQuality(draft, classification.requirements),
        source: 'fallback' as const,
      }
    })
    if (!validated.ok) return finish(state, startTime)
    state.quality = validated.value.assessment
    state.qualitySource = validated.value.source
    state.stage = 'validated'

    // -------------------------------------------------------------------------
    // Step 6: Decide
    // -------------------------------------------------------------------------
    const decided = await runStage(state, 'decide', signal, async () =>
      decide(state.quality, state.classification)
    )
    if (!decided.ok) return finish(state, startTime)
    state.decision = decided.value
    state.stage = 'decided'

    await log('info', 'pipeline completed', {
      workflow: 'pipeline',
      requestId,
      action: decided.value.action,
      priority: decided.value.priority,
      adjustedConfidence: decided.value.adjustedConfidence,
      qualitySource: state.qualitySource,
      durationMs: Date.now() - startTime,
    })

    return finish(state, startTime)
  }

  return {
    run,
    async flush() {
      await Promise.allSettled([...pendingReports])
    },
  }
}
