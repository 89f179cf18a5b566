import {
  type TriageService,
  createDefaultTriageService,
} from '@inbox-triage/core'
import type { Command } from 'commander'
import { type CLIError, formatError } from './errors'
import {
  type OutputFormat,
  type OutputFormatter,
  createOutputFormatter,
  resolveOutputFormat,
} from './output'

export interface CommandContext {
  stdin: NodeJS.ReadStream
  stdout: NodeJS.WriteStream
  stderr: NodeJS.WriteStream
  signal: AbortSignal
  format: OutputFormat
  output: OutputFormatter
  verbose: boolean
  quiet: boolean
  /** Built on first use so commands that never touch the pipeline stay cheap */
  getTriageService: () => Promise<TriageService>
}

function memoize<T>(factory: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null
  return () => {
    pending ??= factory()
    return pending
  }
}

export function createContext(
  overrides: Partial<CommandContext> = {}
): CommandContext {
  const stdout = overrides.stdout ?? process.stdout
  const stderr = overrides.stderr ?? process.stderr
  const verbose = overrides.verbose ?? false
  const quiet = overrides.quiet ?? false
  const format = resolveOutputFormat(overrides.format, stdout)
  const output =
    overrides.output ??
    createOutputFormatter({
      format,
      stdout,
      stderr,
      verbose,
      quiet,
    })

  return {
    stdin: overrides.stdin ?? process.stdin,
    stdout,
    stderr,
    signal: overrides.signal ?? new AbortController().signal,
    format,
    output,
    verbose,
    quiet,
    getTriageService:
      overrides.getTriageService ??
      memoize(() => createDefaultTriageService()),
  }
}

interface GlobalOptions {
  format?: OutputFormat
  verbose?: boolean
  quiet?: boolean
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'table']

function readGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals()
  const format = OUTPUT_FORMATS.find((f) => f === opts.format)
  return {
    format,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  }
}

/**
 * Context for a commander action, honouring the global flags and a
 * command-level `--json`.
 */
export function contextFromCommand(
  command: Command,
  json?: boolean,
  signal?: AbortSignal
): CommandContext {
  const globals = readGlobalOptions(command)
  return createContext({
    format: json ? 'json' : globals.format,
    verbose: globals.verbose,
    quiet: globals.quiet,
    signal,
  })
}

export function reportError(ctx: CommandContext, error: CLIError): void {
  ctx.output.error(formatError(error))
  if (ctx.verbose && error.debugMessage) {
    ctx.output.message(error.debugMessage)
  }
  process.exitCode = error.exitCode
}
