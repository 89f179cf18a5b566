import { PassThrough } from 'node:stream'
import { describe, expect, it } from 'vitest'
import {
  type OutputFormatterConfig,
  createOutputFormatter,
  resolveOutputFormat,
} from '../../../src/core/output'

const createCapture = () => {
  const stream = new PassThrough() as unknown as NodeJS.WriteStream
  let output = ''
  stream.on('data', (chunk) => {
    output += chunk.toString()
  })
  return { stream, read: () => output }
}

const settle = () => new Promise((resolve) => setImmediate(resolve))

const setup = (config: Omit<OutputFormatterConfig, 'stdout' | 'stderr'>) => {
  const stdout = createCapture()
  const stderr = createCapture()
  const formatter = createOutputFormatter({
    ...config,
    stdout: stdout.stream,
    stderr: stderr.stream,
  })
  return { formatter, stdout, stderr }
}

describe('OutputFormatter', () => {
  it('writes JSON data to stdout', async () => {
    const { formatter, stdout, stderr } = setup({ format: 'json' })

    formatter.data({ decision: 'auto_send' })

    await settle()
    expect(stdout.read()).toBe('{"decision":"auto_send"}\n')
    expect(stderr.read()).toBe('')
  })

  it('renders aligned tables', async () => {
    const { formatter, stdout } = setup({ format: 'table' })

    formatter.table([
      { decision: 'auto_send', count: 2 },
      { decision: 'manual_handle', count: 12 },
    ])

    await settle()
    expect(stdout.read().split('\n')).toEqual([
      'decision       count',
      'auto_send      2    ',
      'manual_handle  12   ',
      '',
    ])
  })

  it('prints nothing for a table without columns', async () => {
    const { formatter, stdout } = setup({ format: 'text' })

    formatter.table([])

    await settle()
    expect(stdout.read()).toBe('')
  })

  it('renders labelled fields in text mode', async () => {
    const { formatter, stdout } = setup({ format: 'text' })

    formatter.fields({ Request: 'req-1', Decision: 'auto_send', Issues: 0 })

    await settle()
    expect(stdout.read()).toBe(
      'Request:  req-1\nDecision: auto_send\nIssues:   0\n'
    )
  })

  it('renders fields as one object in JSON mode', async () => {
    const { formatter, stdout } = setup({ format: 'json' })

    formatter.fields({ Request: 'req-1', Issues: 0 })

    await settle()
    expect(stdout.read()).toBe('{"Request":"req-1","Issues":0}\n')
  })

  it('sets a reply off below the fields in text mode', async () => {
    const { formatter, stdout } = setup({ format: 'text' })

    formatter.reply({ subject: 'Re: Pricing', body: 'Thanks Sam.' })

    await settle()
    expect(stdout.read()).toBe('\nSubject: Re: Pricing\n\nThanks Sam.\n')
  })

  it('keeps only subject and body of a reply in JSON mode', async () => {
    const { formatter, stdout } = setup({ format: 'json' })

    formatter.reply({ subject: 'Re: Pricing', body: 'Thanks Sam.' })

    await settle()
    expect(stdout.read()).toBe('{"subject":"Re: Pricing","body":"Thanks Sam."}\n')
  })

  it('wraps JSON tables with their column labels', async () => {
    const { formatter, stdout } = setup({ format: 'json' })

    formatter.table([{ check: 'database', status: 'ok' }], [
      { key: 'check', label: 'Check' },
      'status',
    ])

    await settle()
    expect(JSON.parse(stdout.read())).toEqual({
      columns: ['Check', 'status'],
      rows: [{ check: 'database', status: 'ok' }],
    })
  })

  it('respects quiet mode for non-error messages', async () => {
    const { formatter, stdout, stderr } = setup({
      format: 'text',
      quiet: true,
    })

    formatter.message('note')
    formatter.success('done')
    formatter.warn('heads up')
    formatter.progress('working')
    formatter.error('fail')

    await settle()
    expect(stdout.read()).toBe('')
    expect(stderr.read()).toBe('ERROR: fail\n')
  })

  it('emits progress only when verbose', async () => {
    const { formatter, stderr } = setup({ format: 'text', verbose: true })

    formatter.progress('working')

    await settle()
    expect(stderr.read()).toBe('working\n')
  })

  it('auto-detects JSON when stdout is not a TTY', async () => {
    const stdout = createCapture()
    const stderr = createCapture()
    stdout.stream.isTTY = false

    const formatter = createOutputFormatter({
      stdout: stdout.stream,
      stderr: stderr.stream,
    })

    formatter.data({ ok: true })

    await settle()
    expect(stdout.read()).toBe('{"ok":true}\n')
  })

  it('prefers explicit output format over TTY detection', () => {
    const stdout = createCapture()
    stdout.stream.isTTY = false

    expect(resolveOutputFormat('table', stdout.stream)).toBe('table')
  })
})
