import { sql } from 'drizzle-orm'
import {
  boolean,
  datetime,
  double,
  index,
  int,
  json,
  mysqlTable,
  text,
  varchar,
} from 'drizzle-orm/mysql-core'

export const TRIAGE_DECISIONS = [
  'auto_send',
  'human_review',
  'manual_handle',
] as const

/**
 * One row per email that reached a decision
 */
export const HistoryTable = mysqlTable(
  'TRIAGE_history',
  {
    id: int('id').autoincrement().primaryKey(),
    request_id: varchar('request_id', { length: 255 }).notNull().unique(),

    email_text: text('email_text').notNull(),
    decision: varchar('decision', {
      length: 50,
      enum: TRIAGE_DECISIONS,
    }).notNull(),
    confidence: double('confidence').notNull(),

    response_subject: text('response_subject'),
    response_body: text('response_body'),

    processing_time: double('processing_time').notNull(),
    quality_approved: boolean('quality_approved').notNull().default(false),
    metadata: json('metadata').$type<Record<string, unknown>>(),

    created_at: datetime('created_at')
      .notNull()
      .default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index('created_at_idx').on(table.created_at)]
)

export type HistoryRow = typeof HistoryTable.$inferSelect
export type NewHistoryRow = typeof HistoryTable.$inferInsert
