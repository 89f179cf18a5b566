import type { Command } from 'commander'
import {
  type CommandContext,
  contextFromCommand,
  reportError,
} from '../core/context'
import { CLIError, DatabaseError } from '../core/errors'

export async function runStats(ctx: CommandContext): Promise<void> {
  try {
    const service = await ctx.getTriageService()
    const stats = await service.getStats()

    if (ctx.format === 'json') {
      ctx.output.data(stats)
      return
    }

    ctx.output.fields({
      'Total processed': stats.totalProcessed,
      'Avg confidence': stats.avgConfidence.toFixed(2),
      'Avg processing time': `${stats.avgProcessingTimeMs}ms`,
      'Quality approval rate': `${stats.qualityApprovalRate}%`,
    })
  } catch (error) {
    reportError(
      ctx,
      error instanceof CLIError
        ? error
        : new DatabaseError({
            userMessage: 'Failed to compute statistics.',
            suggestion: 'Ensure DATABASE_URL is configured and reachable.',
            debugMessage: error instanceof Error ? error.message : undefined,
            cause: error,
          })
    )
  }
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Aggregate statistics over processed emails')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runStats(contextFromCommand(command, options.json))
    })
}
