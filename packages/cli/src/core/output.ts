import { inspect } from 'node:util'

export type OutputFormat = 'json' | 'text' | 'table'

export type TableColumn = string | { key: string; label?: string }
export type TableRow = Record<string, unknown>

/** A drafted reply as the commands print it */
export interface ReplyOutput {
  subject: string
  body: string
}

export interface OutputFormatter {
  data(value: unknown): void
  table(rows: TableRow[], columns?: TableColumn[]): void
  /** Labelled values, one per line; a single object in JSON mode */
  fields(record: Record<string, unknown>): void
  /** Subject and body, set off from whatever was printed above */
  reply(reply: ReplyOutput): void
  message(text: string): void
  success(text: string): void
  warn(text: string): void
  error(text: string): void
  progress(label: string): void
}

export interface OutputFormatterConfig {
  format?: OutputFormat
  stdout: NodeJS.WriteStream
  stderr: NodeJS.WriteStream
  verbose?: boolean
  quiet?: boolean
}

// ============================================================================
// Rendering
// ============================================================================

/** Turns stdout payloads into lines for one output format */
interface Renderer {
  data(value: unknown): string[]
  table(rows: TableRow[], columns?: TableColumn[]): string[]
  fields(record: Record<string, unknown>): string[]
  reply(reply: ReplyOutput): string[]
}

const valueToCell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(value)
}

const normalizeColumns = (
  columns: TableColumn[] | undefined,
  rows: TableRow[]
): { key: string; label: string }[] => {
  if (columns && columns.length > 0) {
    return columns.map((column) =>
      typeof column === 'string'
        ? { key: column, label: column }
        : { key: column.key, label: column.label ?? column.key }
    )
  }
  const [firstRow] = rows
  if (!firstRow) return []
  return Object.keys(firstRow).map((key) => ({ key, label: key }))
}

const jsonRenderer: Renderer = {
  data: (value) => [JSON.stringify(value)],
  table: (rows, columns) => [
    JSON.stringify({
      columns: normalizeColumns(columns, rows).map((column) => column.label),
      rows,
    }),
  ],
  fields: (record) => [JSON.stringify(record)],
  reply: ({ subject, body }) => [JSON.stringify({ subject, body })],
}

const textRenderer: Renderer = {
  data(value) {
    if (typeof value === 'string') return [value]
    if (typeof value === 'number' || typeof value === 'boolean') {
      return [String(value)]
    }
    return [inspect(value, { depth: null, colors: false })]
  },

  table(rows, columns) {
    const normalized = normalizeColumns(columns, rows)
    if (normalized.length === 0) return []

    const cells = rows.map((row) =>
      normalized.map((column) => valueToCell(row[column.key]))
    )
    const widths = normalized.map((column, index) =>
      Math.max(
        column.label.length,
        ...cells.map((line) => (line[index] ?? '').length)
      )
    )
    const joinRow = (values: string[]) =>
      values.map((value, index) => value.padEnd(widths[index] ?? 0)).join('  ')

    return [
      joinRow(normalized.map((column) => column.label)),
      ...cells.map(joinRow),
    ]
  },

  fields(record) {
    const entries = Object.entries(record)
    const width = Math.max(0, ...entries.map(([label]) => label.length)) + 2
    return entries.map(
      ([label, value]) => `${`${label}:`.padEnd(width)}${valueToCell(value)}`
    )
  },

  reply: ({ subject, body }) => ['', `Subject: ${subject}`, '', body],
}

const RENDERERS: Record<OutputFormat, Renderer> = {
  json: jsonRenderer,
  text: textRenderer,
  table: textRenderer,
}

// ============================================================================
// Formatter
// ============================================================================

export const resolveOutputFormat = (
  format: OutputFormat | undefined,
  stdout: NodeJS.WriteStream
): OutputFormat => {
  if (format) return format
  return stdout.isTTY ? 'text' : 'json'
}

/**
 * Payloads go to stdout in the resolved format. Status lines go to stderr;
 * quiet drops all but errors and progress needs verbose.
 */
export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => {
  const renderer = RENDERERS[resolveOutputFormat(config.format, config.stdout)]
  const verbose = config.verbose ?? false
  const quiet = config.quiet ?? false

  const toStdout = (lines: string[]) => {
    for (const line of lines) config.stdout.write(`${line}\n`)
  }
  const toStderr = (line: string) => {
    config.stderr.write(`${line}\n`)
  }
  const status = (line: string) => {
    if (!quiet) toStderr(line)
  }

  return {
    data: (value) => toStdout(renderer.data(value)),
    table: (rows, columns) => toStdout(renderer.table(rows, columns)),
    fields: (record) => toStdout(renderer.fields(record)),
    reply: (reply) => toStdout(renderer.reply(reply)),
    message: (text) => status(text),
    success: (text) => status(`SUCCESS: ${text}`),
    warn: (text) => status(`WARN: ${text}`),
    error: (text) => toStderr(`ERROR: ${text}`),
    progress: (label) => {
      if (verbose && !quiet) toStderr(label)
    },
  }
}
