/**
 * `inbox-triage metrics`: dashboard over the JSON-lines metrics log.
 */

import {
  type MetricsSummary,
  readMetricsLog,
  summarizeMetrics,
} from '@inbox-triage/core'
import type { Command } from 'commander'
import {
  type CommandContext,
  contextFromCommand,
  reportError,
} from '../core/context'
import { toCLIError } from '../core/errors'

async function loadSummary(
  ctx: CommandContext,
  logPath: string | undefined
): Promise<MetricsSummary | null> {
  if (logPath) return summarizeMetrics(await readMetricsLog(logPath))
  const service = await ctx.getTriageService()
  return service.getMetricsSummary()
}

export async function runMetrics(
  ctx: CommandContext,
  options: { log?: string }
): Promise<void> {
  try {
    const summary = await loadSummary(ctx, options.log)

    if (ctx.format === 'json') {
      ctx.output.data(summary)
      return
    }
    if (!summary) {
      ctx.output.warn('No metrics logged yet.')
      return
    }

    ctx.output.fields({
      'Total requests': summary.totalRequests,
      'Success rate': `${summary.successRate.toFixed(1)}%`,
      'Autonomous handling': `${summary.autonomousHandlingRate.toFixed(1)}%`,
      'Avg quality confidence': summary.avgQualityConfidence.toFixed(2),
      'Avg response length': `${summary.avgResponseLength.toFixed(0)} words`,
    })

    const breakdown = Object.entries(summary.decisionBreakdown)
    if (breakdown.length === 0) return

    ctx.output.data('')
    ctx.output.table(
      breakdown.map(([decision, count]) => ({
        decision,
        count,
        share: `${((count / summary.successful) * 100).toFixed(1)}%`,
      })),
      [
        { key: 'decision', label: 'Decision' },
        { key: 'count', label: 'Count' },
        { key: 'share', label: 'Share' },
      ]
    )
  } catch (error) {
    reportError(
      ctx,
      toCLIError(
        error,
        'Failed to read metrics.',
        'Check METRICS_LOG_PATH or pass --log.'
      )
    )
  }
}

export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('Summarize the per-request metrics log')
    .option('--log <path>', 'Metrics log to read (default METRICS_LOG_PATH)')
    .option('--json', 'Output as JSON')
    .action(async (options: { log?: string; json?: boolean }, command: Command) => {
      await runMetrics(contextFromCommand(command, options.json), options)
    })
}
