/**
 * MySQL-backed history store
 *
 * Rows live in TRIAGE_history, unique on request_id. A second insert for the
 * same request is a no-op.
 */

import {
  type Database,
  HistoryTable,
  type HistoryRow,
  count,
  desc,
  eq,
  getDb,
  sql,
  sum,
} from '@inbox-triage/database'
import { log } from '../observability/axiom'
import type { PipelineState } from '../pipeline/types'
import { entryFromState, toHistoryStats } from './entry'
import {
  DEFAULT_HISTORY_LIMIT,
  type HistoryEntry,
  type HistoryStats,
  type HistoryStore,
  type NewHistoryEntry,
} from './types'

export function toHistoryEntry(row: HistoryRow): HistoryEntry {
  return {
    requestId: row.request_id,
    emailText: row.email_text,
    decision: row.decision,
    confidence: row.confidence,
    subject: row.response_subject ?? '',
    body: row.response_body ?? '',
    processingTimeMs: row.processing_time,
    qualityApproved: row.quality_approved,
    metadata: row.metadata ?? {},
    createdAt: row.created_at.toISOString(),
  }
}

export class DrizzleHistoryStore implements HistoryStore {
  constructor(private readonly getDatabase: () => Database = getDb) {}

  async add(entry: NewHistoryEntry): Promise<boolean> {
    if (await this.get(entry.requestId)) {
      await log('debug', 'history entry already stored', {
        workflow: 'history',
        requestId: entry.requestId,
      })
      return false
    }

    const db = this.getDatabase()
    await db
      .insert(HistoryTable)
      .values({
        request_id: entry.requestId,
        email_text: entry.emailText,
        decision: entry.decision,
        confidence: entry.confidence,
        response_subject: entry.subject,
        response_body: entry.body,
        processing_time: entry.processingTimeMs,
        quality_approved: entry.qualityApproved,
        metadata: entry.metadata,
      })
      // no-op update: a concurrent insert of the same request wins
      .onDuplicateKeyUpdate({
        set: { request_id: entry.requestId },
      })

    return true
  }

  async get(requestId: string): Promise<HistoryEntry | null> {
    const db = this.getDatabase()
    const [row] = await db
      .select()
      .from(HistoryTable)
      .where(eq(HistoryTable.request_id, requestId))
      .limit(1)

    return row ? toHistoryEntry(row) : null
  }

  async list(limit = DEFAULT_HISTORY_LIMIT): Promise<HistoryEntry[]> {
    const db = this.getDatabase()
    const rows = await db
      .select()
      .from(HistoryTable)
      .orderBy(desc(HistoryTable.created_at), desc(HistoryTable.id))
      .limit(limit)

    return rows.map(toHistoryEntry)
  }

  async delete(requestId: string): Promise<boolean> {
    const db = this.getDatabase()
    const [result] = await db
      .delete(HistoryTable)
      .where(eq(HistoryTable.request_id, requestId))

    return result.affectedRows > 0
  }

  async clear(): Promise<number> {
    const db = this.getDatabase()
    const [result] = await db.delete(HistoryTable)
    return result.affectedRows
  }

  async stats(): Promise<HistoryStats> {
    const db = this.getDatabase()
    const [row] = await db
      .select({
        total: count(),
        confidenceSum: sum(HistoryTable.confidence),
        processingTimeSum: sum(HistoryTable.processing_time),
        approvedCount: sql<
          string | null
        >`sum(case when ${HistoryTable.quality_approved} then 1 else 0 end)`,
      })
      .from(HistoryTable)

    // MySQL returns SUM as a decimal string, null over an empty table
    return toHistoryStats({
      total: row?.total ?? 0,
      confidenceSum: Number(row?.confidenceSum ?? 0),
      processingTimeSum: Number(row?.processingTimeSum ?? 0),
      approvedCount: Number(row?.approvedCount ?? 0),
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
