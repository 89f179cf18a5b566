import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  flushAxiom,
  initializeAxiom,
  log,
  tracePipelineRun,
  withTracing,
} from './axiom'

const { mockEnv } = vi.hoisted(() => {
  const mockEnv: { AXIOM_TOKEN?: string; AXIOM_DATASET?: string } = {}
  return { mockEnv }
})

vi.mock('../config/env', () => ({ env: mockEnv }))

// Mock @axiomhq/js
const mockIngest = vi.fn()
const mockFlush = vi.fn()

vi.mock('@axiomhq/js', () => ({
  Axiom: vi.fn(function () {
    return {
      ingest: mockIngest,
      flush: mockFlush,
    }
  }),
}))

describe('Axiom Tracing', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    mockFlush.mockResolvedValue(undefined)

    mockEnv.AXIOM_TOKEN = 'test-secret'
    mockEnv.AXIOM_DATASET = 'triage-test'

    initializeAxiom()
  })

  afterEach(() => {
    delete mockEnv.AXIOM_TOKEN
    delete mockEnv.AXIOM_DATASET
    initializeAxiom()
  })

  describe('withTracing', () => {
    it('should wrap function execution and send trace to Axiom', async () => {
      const testFn = vi.fn(async () => 'success')

      const result = await withTracing('pipeline.classify', testFn, {
        requestId: 'req-123',
      })

      expect(result).toBe('success')
      expect(testFn).toHaveBeenCalledTimes(1)
      expect(mockIngest).toHaveBeenCalledWith(
        'triage-test',
        expect.objectContaining({
          name: 'pipeline.classify',
          status: 'success',
          requestId: 'req-123',
          durationMs: expect.any(Number),
        })
      )
    })

    it('should capture errors and mark status as error', async () => {
      const testFn = vi.fn(async () => {
        throw new Error('Test failure')
      })

      await expect(withTracing('failing-operation', testFn)).rejects.toThrow(
        'Test failure'
      )

      expect(mockIngest).toHaveBeenCalledWith(
        'triage-test',
        expect.objectContaining({
          name: 'failing-operation',
          status: 'error',
          error: 'Test failure',
          errorStack: expect.stringContaining('Error: Test failure'),
        })
      )
    })
  })

  describe('log', () => {
    it('should keep reserved fields over metadata', async () => {
      await log('error', 'metrics sink failed', {
        requestId: 'req-1',
        level: 'info',
      })

      expect(mockIngest).toHaveBeenCalledWith(
        'triage-test',
        expect.objectContaining({
          name: 'log',
          level: 'error',
          status: 'error',
          success: false,
          message: 'metrics sink failed',
          requestId: 'req-1',
        })
      )
    })

    it('should not throw when ingestion fails', async () => {
      const consoleError = vi
        .spyOn(console, 'error')
        .mockImplementation(() => {})
      mockIngest.mockImplementationOnce(() => {
        throw new Error('network down')
      })

      await expect(log('info', 'hello')).resolves.toBeUndefined()
      expect(consoleError).toHaveBeenCalledTimes(1)
      consoleError.mockRestore()
    })

    it('should be a no-op without a token', async () => {
      delete mockEnv.AXIOM_TOKEN
      initializeAxiom()

      await log('info', 'dropped')

      expect(mockIngest).not.toHaveBeenCalled()
    })
  })

  describe('configuration', () => {
    it('should authenticate with the configured token', async () => {
      const { Axiom } = await import('@axiomhq/js')

      expect(Axiom).toHaveBeenCalledWith({ token: 'test-secret' })
    })

    it('should fall back to the default dataset', async () => {
      delete mockEnv.AXIOM_DATASET

      await log('info', 'hello')

      expect(mockIngest).toHaveBeenCalledWith(
        'inbox-triage',
        expect.objectContaining({ message: 'hello' })
      )
    })
  })

  describe('tracePipelineRun', () => {
    it('should mark runs with an error stage as errors', async () => {
      await tracePipelineRun({
        requestId: 'req-9',
        stage: 'error',
        durationMs: 12,
        errorStage: 'research',
        errorMessage: 'search down',
      })

      expect(mockIngest).toHaveBeenCalledWith(
        'triage-test',
        expect.objectContaining({
          name: 'pipeline.run',
          status: 'error',
          errorStage: 'research',
        })
      )
    })
  })

  describe('flushAxiom', () => {
    it('should flush the client', async () => {
      await flushAxiom()
      expect(mockFlush).toHaveBeenCalledTimes(1)
    })
  })
})
