import { Index } from '@upstash/vector'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  countVectors,
  getVectorIndex,
  queryVectors,
  resetVectorIndex,
  upsertVectors,
} from './client'

const { mockUpsert, mockInfo, mockQuery } = vi.hoisted(() => ({
  mockUpsert: vi.fn().mockResolvedValue('Success'),
  mockInfo: vi.fn().mockResolvedValue({ vectorCount: 3 }),
  mockQuery: vi.fn().mockResolvedValue([
    {
      id: 'cs-1',
      score: 0.91,
      data: 'Retail forecasting\n\nCut stockouts by 30%',
      metadata: {
        title: 'Retail forecasting',
        category: 'case_study',
      },
    },
  ]),
}))

vi.mock('@upstash/vector', () => ({
  Index: vi.fn().mockImplementation(function () {
    return {
      upsert: mockUpsert,
      query: mockQuery,
      info: mockInfo,
    }
  }),
}))

const { mockEnv } = vi.hoisted(() => {
  const mockEnv: { UPSTASH_VECTOR_URL?: string; UPSTASH_VECTOR_TOKEN?: string } =
    {}
  return { mockEnv }
})

vi.mock('../config/env', () => ({ env: mockEnv }))

beforeEach(() => {
  mockEnv.UPSTASH_VECTOR_URL = 'https://test-vector.upstash.io'
  mockEnv.UPSTASH_VECTOR_TOKEN = 'test-secret'
  resetVectorIndex()
  vi.mocked(Index).mockClear()
  mockUpsert.mockClear()
  mockQuery.mockClear()
  mockInfo.mockClear()
})

describe('Vector Client', () => {
  describe('getVectorIndex', () => {
    it('should return the same instance on subsequent calls (singleton)', () => {
      const index1 = getVectorIndex()
      const index2 = getVectorIndex()

      expect(index1).toBe(index2)
      expect(Index).toHaveBeenCalledTimes(1)
      expect(Index).toHaveBeenCalledWith({
        url: 'https://test-vector.upstash.io',
        token: 'test-secret',
      })
    })

    it('should build a fresh instance after a reset', () => {
      getVectorIndex()
      mockEnv.UPSTASH_VECTOR_TOKEN = 'rotated-secret'

      resetVectorIndex()
      getVectorIndex()

      expect(Index).toHaveBeenCalledTimes(2)
      expect(Index).toHaveBeenLastCalledWith({
        url: 'https://test-vector.upstash.io',
        token: 'rotated-secret',
      })
    })

    it('should throw if UPSTASH_VECTOR_URL is missing', () => {
      delete mockEnv.UPSTASH_VECTOR_URL

      expect(() => getVectorIndex()).toThrow(
        'UPSTASH_VECTOR_URL environment variable is required'
      )
    })

    it('should throw if UPSTASH_VECTOR_TOKEN is missing', () => {
      delete mockEnv.UPSTASH_VECTOR_TOKEN

      expect(() => getVectorIndex()).toThrow(
        'UPSTASH_VECTOR_TOKEN environment variable is required'
      )
    })
  })

  describe('upsertVectors', () => {
    it('should upsert documents in one batch', async () => {

      await upsertVectors([
        {
          id: 'cs-1',
          data: 'Retail forecasting',
          metadata: {
            title: 'Retail forecasting',
            content: 'Cut stockouts',
            category: 'case_study',
            industry: 'retail',
            tags: ['forecasting'],
          },
        },
      ])

      expect(mockUpsert).toHaveBeenCalledWith([
        {
          id: 'cs-1',
          data: 'Retail forecasting',
          metadata: {
            title: 'Retail forecasting',
            content: 'Cut stockouts',
            category: 'case_study',
            industry: 'retail',
            tags: ['forecasting'],
          },
        },
      ])
    })

    it('should skip empty batches', async () => {

      await upsertVectors([])

      expect(mockUpsert).not.toHaveBeenCalled()
    })
  })

  describe('queryVectors', () => {
    it('should query vectors and return results', async () => {

      const results = await queryVectors({
        data: 'search query',
        topK: 5,
        includeMetadata: true,
        includeData: true,
      })

      expect(mockQuery).toHaveBeenCalledWith({
        data: 'search query',
        topK: 5,
        includeMetadata: true,
        includeData: true,
      })
      expect(results).toHaveLength(1)
      expect(results[0]?.id).toBe('cs-1')
      expect(results[0]?.score).toBe(0.91)
    })
  })

  describe('countVectors', () => {
    it('should read the vector count from index info', async () => {

      await expect(countVectors()).resolves.toBe(3)
    })
  })
})
