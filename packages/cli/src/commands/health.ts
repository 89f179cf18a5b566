/**
 * `inbox-triage health`: check every backing service the pipeline needs.
 */

import {
  countVectors,
  env,
  hasDatabaseUrl,
  loadConfig,
} from '@inbox-triage/core'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { EXIT_CODES } from '../core/errors'

export type CheckStatus = 'ok' | 'error' | 'skipped'

export type HealthCheck = {
  check: string
  status: CheckStatus
  detail: string
}

async function runCheck(
  check: string,
  fn: () => Promise<string>
): Promise<HealthCheck> {
  try {
    return { check, status: 'ok', detail: await fn() }
  } catch (error) {
    return {
      check,
      status: 'error',
      detail: error instanceof Error ? error.message : 'Unknown error',
    }
  }
}

export async function collectHealthChecks(
  ctx: CommandContext
): Promise<HealthCheck[]> {
  const config = loadConfig()

  const database: HealthCheck = hasDatabaseUrl()
    ? await runCheck('database', async () => {
        const service = await ctx.getTriageService()
        const stats = await service.getStats()
        return `${stats.totalProcessed} history entries`
      })
    : {
        check: 'database',
        status: 'skipped',
        detail: 'DATABASE_URL not set; history kept in memory',
      }

  const vectorIndex = await runCheck('vector index', async () => {
    const count = await countVectors()
    return `${count} documents`
  })

  const webSearch: HealthCheck = config.tavilyApiKey
    ? { check: 'web search', status: 'ok', detail: 'TAVILY_API_KEY set' }
    : {
        check: 'web search',
        status: 'skipped',
        detail: 'TAVILY_API_KEY not set; research runs without sources',
      }

  const tracing: HealthCheck = env.AXIOM_TOKEN
    ? { check: 'tracing', status: 'ok', detail: 'AXIOM_TOKEN set' }
    : { check: 'tracing', status: 'skipped', detail: 'AXIOM_TOKEN not set' }

  return [database, vectorIndex, webSearch, tracing]
}

export async function runHealth(ctx: CommandContext): Promise<void> {
  const checks = await collectHealthChecks(ctx)
  const healthy = checks.every((check) => check.status !== 'error')

  if (ctx.format === 'json') {
    ctx.output.data({ status: healthy ? 'ok' : 'error', checks })
  } else {
    ctx.output.table(checks, [
      { key: 'check', label: 'Check' },
      { key: 'status', label: 'Status' },
      { key: 'detail', label: 'Detail' },
    ])
  }

  if (!healthy) {
    process.exitCode = EXIT_CODES.error
  }
}

export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Check database, vector index and API configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runHealth(contextFromCommand(command, options.json))
    })
}
