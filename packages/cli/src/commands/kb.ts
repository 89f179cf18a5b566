/**
 * `inbox-triage kb`: knowledge base maintenance.
 */

import { resolve } from 'node:path'
import {
  type KnowledgeDocument,
  loadKnowledgeDocuments,
  seedKnowledgeBase,
} from '@inbox-triage/core'
import type { Command } from 'commander'
import {
  type CommandContext,
  contextFromCommand,
  reportError,
} from '../core/context'
import { CLIError, NetworkError, UsageError } from '../core/errors'

export const DEFAULT_KNOWLEDGE_DIR = 'data/knowledge_base'

function loadDocuments(dir: string): KnowledgeDocument[] {
  try {
    return loadKnowledgeDocuments(dir)
  } catch (error) {
    throw new UsageError({
      userMessage: `Invalid knowledge file in ${dir}`,
      debugMessage: error instanceof Error ? error.message : undefined,
      cause: error,
    })
  }
}

export async function runKbSeed(
  ctx: CommandContext,
  options: { dir?: string }
): Promise<void> {
  try {
    const dir = resolve(options.dir ?? DEFAULT_KNOWLEDGE_DIR)
    const documents = loadDocuments(dir)

    if (documents.length === 0) {
      ctx.output.warn(`No knowledge files found in ${dir}`)
      return
    }

    ctx.output.progress(`Seeding ${documents.length} documents...`)
    const result = await seedKnowledgeBase(documents)

    if (ctx.format === 'json') {
      ctx.output.data({ dir, ...result })
      return
    }
    if (result.skipped) {
      ctx.output.message(
        `Knowledge base already holds ${result.existingCount} documents; skipping seed.`
      )
      return
    }
    ctx.output.success(`Seeded ${result.seeded} documents from ${dir}`)
  } catch (error) {
    reportError(
      ctx,
      error instanceof CLIError
        ? error
        : new NetworkError({
            userMessage: 'Knowledge base seed failed.',
            suggestion: 'Check UPSTASH_VECTOR_URL and UPSTASH_VECTOR_TOKEN.',
            debugMessage: error instanceof Error ? error.message : undefined,
            cause: error,
          })
    )
  }
}

export function registerKbCommands(program: Command): void {
  const kb = program.command('kb').description('Manage the knowledge base')

  kb.command('seed')
    .description('Load case studies and company info into an empty index')
    .option('--dir <path>', `Directory with knowledge files (default ${DEFAULT_KNOWLEDGE_DIR})`)
    .option('--json', 'Output as JSON')
    .action(async (options: { dir?: string; json?: boolean }, command: Command) => {
      await runKbSeed(contextFromCommand(command, options.json), options)
    })
}
