/**
 * Per-request metrics
 *
 * One flat record per pipeline run, written to Axiom and/or a JSON-lines
 * file, plus the summary the `metrics` command prints.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { log, sendTrace } from '../observability/axiom'
import type { MetricsSink } from '../pipeline/collaborators'
import { errorMessage } from '../pipeline/errors'
import { countWords } from '../pipeline/steps/quality-fallback'
import type { PipelineState } from '../pipeline/types'

// ============================================================================
// Record
// ============================================================================

export const MetricsRecordSchema = z.object({
  timestamp: z.string(),
  requestId: z.string(),
  company: z.string().nullable(),
  intent: z.string().nullable(),
  classificationConfidence: z.number().nullable(),
  decision: z.string().nullable(),
  priority: z.string().nullable(),
  qualityConfidence: z.number().nullable(),
  qualityApproved: z.boolean().nullable(),
  qualitySource: z.string().nullable(),
  issuesFound: z.number(),
  requirementsAddressed: z.number(),
  requirementsMissed: z.number(),
  responseWordCount: z.number(),
  documentsRetrieved: z.number(),
  errorStage: z.string().nullable(),
  errorMessage: z.string().nullable(),
  durationMs: z.number(),
})

export type MetricsRecord = z.infer<typeof MetricsRecordSchema>

export function buildMetricsRecord(
  state: Readonly<PipelineState>,
  now: Date = new Date()
): MetricsRecord {
  const { classification, decision, quality, draft, retrieval, error } = state

  return {
    timestamp: now.toISOString(),
    requestId: state.requestId,
    company: classification?.companyName ?? null,
    intent: classification?.intent ?? null,
    classificationConfidence: classification?.confidence ?? null,
    decision: decision?.action ?? null,
    priority: decision?.priority ?? null,
    qualityConfidence: quality?.confidence ?? null,
    qualityApproved: quality?.approved ?? null,
    qualitySource: state.qualitySource ?? null,
    issuesFound: quality?.issues.length ?? 0,
    requirementsAddressed: quality?.requirementsAddressed.length ?? 0,
    requirementsMissed: quality?.requirementsMissed.length ?? 0,
    responseWordCount: draft ? countWords(draft.body) : 0,
    documentsRetrieved: retrieval?.documents.length ?? 0,
    errorStage: error?.stage ?? null,
    errorMessage: error?.message ?? null,
    durationMs: state.totalDurationMs,
  }
}

// ============================================================================
// Sinks
// ============================================================================

export class AxiomMetricsSink implements MetricsSink {
  async record(state: Readonly<PipelineState>): Promise<void> {
    await sendTrace({
      name: 'pipeline.metrics',
      type: 'metrics',
      ...buildMetricsRecord(state),
    })
  }
}

export class JsonlMetricsSink implements MetricsSink {
  constructor(private readonly path: string) {}

  async record(state: Readonly<PipelineState>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    await appendFile(
      this.path,
      `${JSON.stringify(buildMetricsRecord(state))}\n`,
      'utf8'
    )
  }
}

/**
 * Fan one record out to several sinks. A failing sink is logged and does not
 * stop the others.
 */
export function createCompositeMetricsSink(sinks: MetricsSink[]): MetricsSink {
  return {
    async record(state) {
      const results = await Promise.allSettled(
        sinks.map((sink) => sink.record(state))
      )

      for (const result of results) {
        if (result.status === 'rejected') {
          await log('error', 'metrics sink failed', {
            workflow: 'metrics',
            requestId: state.requestId,
            error: errorMessage(result.reason),
          })
        }
      }
    },
  }
}

// ============================================================================
// Reading and summarizing
// ============================================================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function parseLine(line: string): MetricsRecord | undefined {
  let raw: unknown
  try {
    raw = JSON.parse(line)
  } catch {
    return undefined
  }
  const parsed = MetricsRecordSchema.safeParse(raw)
  return parsed.success ? parsed.data : undefined
}

/**
 * Read a JSON-lines metrics log. Missing file reads as empty; malformed
 * lines are skipped.
 */
export async function readMetricsLog(path: string): Promise<MetricsRecord[]> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }

  const records: MetricsRecord[] = []
  for (const line of content.split('\n')) {
    if (!line.trim()) continue
    const record = parseLine(line)
    if (record) records.push(record)
  }
  return records
}

export interface MetricsSummary {
  totalRequests: number
  successful: number
  failed: number
  /** Percent */
  successRate: number
  /** Percent of successful runs that ended in auto_send */
  autonomousHandlingRate: number
  decisionBreakdown: Record<string, number>
  avgQualityConfidence: number
  avgResponseLength: number
}

export function summarizeMetrics(
  records: MetricsRecord[]
): MetricsSummary | null {
  if (records.length === 0) return null

  const total = records.length
  const successful = records.filter((r) => r.errorStage === null)

  const decisionBreakdown: Record<string, number> = {}
  for (const record of successful) {
    const key = record.decision ?? 'unknown'
    decisionBreakdown[key] = (decisionBreakdown[key] ?? 0) + 1
  }

  const count = successful.length
  const qualitySum = successful.reduce(
    (sum, r) => sum + (r.qualityConfidence ?? 0),
    0
  )
  const wordSum = successful.reduce((sum, r) => sum + r.responseWordCount, 0)

  return {
    totalRequests: total,
    successful: count,
    failed: total - count,
    successRate: (count / total) * 100,
    autonomousHandlingRate:
      count > 0 ? ((decisionBreakdown.auto_send ?? 0) / count) * 100 : 0,
    decisionBreakdown,
    avgQualityConfidence: count > 0 ? qualitySum / count : 0,
    avgResponseLength: count > 0 ? wordSum / count : 0,
  }
}
