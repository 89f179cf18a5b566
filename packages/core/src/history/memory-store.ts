/**
 * In-process history store, used when no DATABASE_URL is configured and in
 * tests.
 */

import type { PipelineState } from '../pipeline/types'
import { entryFromState, toHistoryStats } from './entry'
import {
  DEFAULT_HISTORY_LIMIT,
  type HistoryEntry,
  type HistoryStats,
  type HistoryStore,
  type NewHistoryEntry,
} from './types'

export class MemoryHistoryStore implements HistoryStore {
  // Map keeps insertion order, which is creation order
  private readonly entries = new Map<string, HistoryEntry>()

  constructor(private readonly now: () => Date = () => new Date()) {}

  async add(entry: NewHistoryEntry): Promise<boolean> {
    if (this.entries.has(entry.requestId)) return false
    this.entries.set(entry.requestId, {
      ...entry,
      createdAt: this.now().toISOString(),
    })
    return true
  }

  async get(requestId: string): Promise<HistoryEntry | null> {
    return this.entries.get(requestId) ?? null
  }

  async list(limit = DEFAULT_HISTORY_LIMIT): Promise<HistoryEntry[]> {
    return [...this.entries.values()].reverse().slice(0, limit)
  }

  async delete(requestId: string): Promise<boolean> {
    return this.entries.delete(requestId)
  }

  async clear(): Promise<number> {
    const removed = this.entries.size
    this.entries.clear()
    return removed
  }

  async stats(): Promise<HistoryStats> {
    const all = [...this.entries.values()]
    return toHistoryStats({
      total: all.length,
      confidenceSum: all.reduce((sum, e) => sum + e.confidence, 0),
      processingTimeSum: all.reduce((sum, e) => sum + e.processingTimeMs, 0),
      approvedCount: all.filter((e) => e.qualityApproved).length,
    })
  }

  async record(
    requestId: string,
    state: Readonly<PipelineState>
  ): Promise<void> {
    const entry = entryFromState(state)
    if (!entry) return
    await this.add({ ...entry, requestId })
  }
}
