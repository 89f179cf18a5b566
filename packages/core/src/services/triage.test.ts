import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { makeDecidedState, makeFailedState } from '../__tests__/fixtures'
import { MemoryHistoryStore } from '../history/memory-store'
import { buildMetricsRecord } from '../metrics/collector'
import { PipelineFailure } from '../pipeline/errors'
import { InvalidRequestError, createTriageService } from './triage'

vi.mock('../observability/axiom', () => ({
  log: vi.fn(),
}))

function makePipeline() {
  return {
    run: vi.fn().mockResolvedValue(makeDecidedState()),
    flush: vi.fn().mockResolvedValue(undefined),
  }
}

describe('createTriageService', () => {
  let pipeline: ReturnType<typeof makePipeline>
  let history: MemoryHistoryStore

  beforeEach(() => {
    pipeline = makePipeline()
    history = new MemoryHistoryStore()
  })

  it('turns a decided run into a response', async () => {
    const service = createTriageService({ pipeline, history })

    const response = await service.processEmail({
      emailText: '  Hi, we need inventory forecasting.  ',
      priority: 'high',
      metadata: { source: 'cli' },
    })

    expect(pipeline.run).toHaveBeenCalledWith(
      '  Hi, we need inventory forecasting.  ',
      {
        requestId: undefined,
        priority: 'high',
        metadata: { source: 'cli' },
        signal: undefined,
      }
    )
    expect(response).toEqual({
      requestId: 'req-1',
      decision: 'auto_send',
      confidence: 0.95,
      subject: 'Inventory forecasting for Northwind',
      body: 'Thanks Dana. Our inventory forecasting plugs into your ERP.',
      processingTimeMs: 1200,
      approved: true,
      issuesFound: 1,
      metadata: {
        intent: 'sales_inquiry',
        company: 'Northwind Traders',
        urgency: 'medium',
        priority: 'low',
        ragDocumentCount: 1,
      },
    })
  })

  it('passes a caller-supplied request id through', async () => {
    const service = createTriageService({ pipeline, history })

    await service.processEmail({ emailText: 'Hello' }, { requestId: 'fixed' })

    expect(pipeline.run).toHaveBeenCalledWith('Hello', {
      requestId: 'fixed',
      priority: undefined,
      metadata: undefined,
      signal: undefined,
    })
  })

  it('hands the email to the pipeline exactly as received', async () => {
    const service = createTriageService({ pipeline, history })
    const emailText = '\n  Hi team,\n\n  Pricing please.\n'

    await service.processEmail({ emailText })

    expect(pipeline.run.mock.calls[0]?.[0]).toBe(emailText)
  })

  it('passes the abort signal to the pipeline', async () => {
    const service = createTriageService({ pipeline, history })
    const controller = new AbortController()

    await service.processEmail(
      { emailText: 'Hello' },
      { signal: controller.signal }
    )

    expect(pipeline.run.mock.calls[0]?.[1]?.signal).toBe(controller.signal)
  })

  it('rejects blank email text before running the pipeline', async () => {
    const service = createTriageService({ pipeline, history })

    await expect(service.processEmail({ emailText: '   ' })).rejects.toThrow(
      new InvalidRequestError('Email text is empty')
    )
    expect(pipeline.run).not.toHaveBeenCalled()
  })

  it('raises PipelineFailure with the failing stage', async () => {
    pipeline.run.mockResolvedValue(makeFailedState())
    const service = createTriageService({ pipeline, history })

    const error = await service
      .processEmail({ emailText: 'Hello?' })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PipelineFailure)
    expect(error).toMatchObject({
      requestId: 'req-failed',
      stage: 'research',
      message: 'Research failed: timeout',
    })
  })

  it('delegates history operations to the store', async () => {
    await history.record('req-1', makeDecidedState())
    const service = createTriageService({ pipeline, history })

    const [entry] = await service.listHistory()
    expect(entry?.requestId).toBe('req-1')
    await expect(service.getHistoryEntry('req-1')).resolves.toMatchObject({
      decision: 'auto_send',
    })
    await expect(service.getStats()).resolves.toEqual({
      totalProcessed: 1,
      avgConfidence: 0.95,
      avgProcessingTimeMs: 1200,
      qualityApprovalRate: 100,
    })
    await expect(service.deleteHistoryEntry('req-1')).resolves.toBe(true)
    await expect(service.clearHistory()).resolves.toBe(0)
  })

  it('summarizes the metrics log when one is configured', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'triage-'))
    const metricsLogPath = join(dir, 'metrics.jsonl')
    await writeFile(
      metricsLogPath,
      `${JSON.stringify(buildMetricsRecord(makeDecidedState()))}\n`
    )

    try {
      const service = createTriageService({ pipeline, history, metricsLogPath })
      const summary = await service.getMetricsSummary()

      expect(summary).toMatchObject({
        totalRequests: 1,
        successful: 1,
        autonomousHandlingRate: 100,
        decisionBreakdown: { auto_send: 1 },
      })
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('has no metrics summary without a log path', async () => {
    const service = createTriageService({ pipeline, history })

    await expect(service.getMetricsSummary()).resolves.toBeNull()
  })

  it('flushes the pipeline', async () => {
    const service = createTriageService({ pipeline, history })

    await service.flush()

    expect(pipeline.flush).toHaveBeenCalledOnce()
  })
})
