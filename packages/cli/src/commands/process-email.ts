/**
 * `inbox-triage process`: run one email through the pipeline.
 */

import { readFile } from 'node:fs/promises'
import { PRIORITIES, type Priority } from '@inbox-triage/core'
import type { Command } from 'commander'
import {
  type CommandContext,
  contextFromCommand,
  reportError,
} from '../core/context'
import { CLIError, EXIT_CODES, UsageError, toCLIError } from '../core/errors'
import { createSignalManager } from '../core/signals'

export interface ProcessOptions {
  file?: string
  text?: string
  priority?: string
  json?: boolean
}

async function readStream(stream: NodeJS.ReadStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf8')
}

/**
 * --text wins over --file, which wins over piped stdin.
 */
export async function resolveEmailText(
  ctx: CommandContext,
  options: ProcessOptions
): Promise<string> {
  if (options.text !== undefined) return options.text

  if (options.file !== undefined) {
    try {
      return await readFile(options.file, 'utf8')
    } catch (error) {
      throw new UsageError({
        userMessage: `Cannot read email file: ${options.file}`,
        cause: error,
      })
    }
  }

  if (!ctx.stdin.isTTY) return readStream(ctx.stdin)

  throw new UsageError({
    userMessage: 'No email provided.',
    suggestion: 'Pass --text, --file, or pipe the email on stdin.',
  })
}

export function parsePriority(value: string | undefined): Priority | undefined {
  if (value === undefined) return undefined
  const priority = PRIORITIES.find((p) => p === value)
  if (!priority) {
    throw new UsageError({
      userMessage: `Unknown priority: ${value}`,
      suggestion: `Use one of: ${PRIORITIES.join(', ')}`,
    })
  }
  return priority
}

export async function runProcess(
  ctx: CommandContext,
  options: ProcessOptions
): Promise<void> {
  try {
    const emailText = await resolveEmailText(ctx, options)
    const priority = parsePriority(options.priority)

    ctx.output.progress('Processing email...')
    const service = await ctx.getTriageService()
    const response = await service
      .processEmail({ emailText, priority }, { signal: ctx.signal })
      .finally(() => service.flush())

    if (ctx.format === 'json') {
      ctx.output.data(response)
      return
    }

    ctx.output.fields({
      Request: response.requestId,
      Decision: response.decision,
      Priority: response.metadata.priority,
      Confidence: response.confidence.toFixed(2),
      Approved: response.approved ? 'yes' : 'no',
      Issues: response.issuesFound,
      Company: response.metadata.company,
      Intent: response.metadata.intent,
      Urgency: response.metadata.urgency,
      Documents: response.metadata.ragDocumentCount,
      Time: `${response.processingTimeMs}ms`,
    })
    ctx.output.reply(response)
  } catch (error) {
    if (ctx.signal.aborted) {
      reportError(
        ctx,
        new CLIError({
          userMessage: 'Cancelled.',
          exitCode: EXIT_CODES.cancelled,
          cause: error,
        })
      )
      return
    }
    reportError(
      ctx,
      toCLIError(
        error,
        'Failed to process email.',
        'Check model and vector credentials, then retry.'
      )
    )
  }
}

export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Classify, research and draft a reply for one email')
    .option('--file <path>', 'Read the email from a file')
    .option('--text <email>', 'Email text')
    .option('--priority <level>', `Request priority (${PRIORITIES.join('|')})`)
    .option('--json', 'Output as JSON')
    .action(async (options: ProcessOptions, command: Command) => {
      const signals = createSignalManager()
      try {
        const ctx = contextFromCommand(command, options.json, signals.signal)
        await runProcess(ctx, options)
      } finally {
        signals.dispose()
      }
    })
}
