/**
 * `inbox-triage history`: browse and prune processed emails.
 */

import { hasDatabaseUrl } from '@inbox-triage/core'
import type { Command } from 'commander'
import {
  type CommandContext,
  contextFromCommand,
  reportError,
} from '../core/context'
import { CLIError, DatabaseError, UsageError } from '../core/errors'

const historyError = (error: unknown, message: string): CLIError =>
  error instanceof CLIError
    ? error
    : new DatabaseError({
        userMessage: message,
        suggestion: 'Ensure DATABASE_URL is configured and reachable.',
        debugMessage: error instanceof Error ? error.message : undefined,
        cause: error,
      })

const warnIfEphemeral = (ctx: CommandContext): void => {
  if (!hasDatabaseUrl()) {
    ctx.output.warn('DATABASE_URL not set; history only covers this process.')
  }
}

export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const limit = Number.parseInt(value, 10)
  if (!Number.isInteger(limit) || limit <= 0 || String(limit) !== value) {
    throw new UsageError({
      userMessage: `Invalid limit: ${value}`,
      suggestion: 'Pass a positive whole number.',
    })
  }
  return limit
}

const notFound = (requestId: string): CLIError =>
  new CLIError({
    userMessage: `History entry not found: ${requestId}`,
    suggestion: 'Run `inbox-triage history list` to see stored request ids.',
  })

export async function runHistoryList(
  ctx: CommandContext,
  options: { limit?: string }
): Promise<void> {
  try {
    const limit = parseLimit(options.limit)
    warnIfEphemeral(ctx)
    const service = await ctx.getTriageService()
    const entries = await service.listHistory(limit)

    if (ctx.format === 'json') {
      ctx.output.data(entries)
      return
    }
    if (entries.length === 0) {
      ctx.output.message('No history entries.')
      return
    }

    ctx.output.table(
      entries.map((entry) => ({
        requestId: entry.requestId,
        createdAt: entry.createdAt,
        decision: entry.decision,
        confidence: entry.confidence.toFixed(2),
        company: entry.metadata.company,
      })),
      [
        { key: 'requestId', label: 'Request' },
        { key: 'createdAt', label: 'Created' },
        { key: 'decision', label: 'Decision' },
        { key: 'confidence', label: 'Confidence' },
        { key: 'company', label: 'Company' },
      ]
    )
  } catch (error) {
    reportError(ctx, historyError(error, 'Failed to list history.'))
  }
}

export async function runHistoryGet(
  ctx: CommandContext,
  requestId: string
): Promise<void> {
  try {
    warnIfEphemeral(ctx)
    const service = await ctx.getTriageService()
    const entry = await service.getHistoryEntry(requestId)
    if (!entry) throw notFound(requestId)

    if (ctx.format === 'json') {
      ctx.output.data(entry)
      return
    }

    ctx.output.fields({
      Request: entry.requestId,
      Created: entry.createdAt,
      Decision: entry.decision,
      Confidence: entry.confidence.toFixed(2),
      Approved: entry.qualityApproved ? 'yes' : 'no',
      Time: `${entry.processingTimeMs}ms`,
    })
    ctx.output.reply(entry)
  } catch (error) {
    reportError(ctx, historyError(error, 'Failed to fetch history entry.'))
  }
}

export async function runHistoryDelete(
  ctx: CommandContext,
  requestId: string
): Promise<void> {
  try {
    const service = await ctx.getTriageService()
    const deleted = await service.deleteHistoryEntry(requestId)
    if (!deleted) throw notFound(requestId)

    if (ctx.format === 'json') {
      ctx.output.data({ requestId, deleted: true })
      return
    }
    ctx.output.success(`Deleted ${requestId}`)
  } catch (error) {
    reportError(ctx, historyError(error, 'Failed to delete history entry.'))
  }
}

export async function runHistoryClear(ctx: CommandContext): Promise<void> {
  try {
    const service = await ctx.getTriageService()
    const cleared = await service.clearHistory()

    if (ctx.format === 'json') {
      ctx.output.data({ cleared })
      return
    }
    ctx.output.success(`Cleared ${cleared} history entries`)
  } catch (error) {
    reportError(ctx, historyError(error, 'Failed to clear history.'))
  }
}

export function registerHistoryCommands(program: Command): void {
  const history = program
    .command('history')
    .description('Browse processed emails')

  history
    .command('list')
    .description('List processed emails, newest first')
    .option('--limit <n>', 'Maximum entries to show (default 100)')
    .option('--json', 'Output as JSON')
    .action(async (options: { limit?: string; json?: boolean }, command: Command) => {
      await runHistoryList(contextFromCommand(command, options.json), options)
    })

  history
    .command('get')
    .description('Show one processed email')
    .argument('<requestId>', 'Request id')
    .option('--json', 'Output as JSON')
    .action(async (requestId: string, options: { json?: boolean }, command: Command) => {
      await runHistoryGet(contextFromCommand(command, options.json), requestId)
    })

  history
    .command('delete')
    .description('Delete one processed email')
    .argument('<requestId>', 'Request id')
    .option('--json', 'Output as JSON')
    .action(async (requestId: string, options: { json?: boolean }, command: Command) => {
      await runHistoryDelete(contextFromCommand(command, options.json), requestId)
    })

  history
    .command('clear')
    .description('Delete every processed email')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runHistoryClear(contextFromCommand(command, options.json))
    })
}
