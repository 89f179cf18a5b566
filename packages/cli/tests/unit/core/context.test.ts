import { PassThrough } from 'node:stream'
import { Command } from 'commander'
import { describe, expect, it, vi } from 'vitest'
import { contextFromCommand, createContext } from '../../../src/core/context'
import { createFakeService } from '../../helpers/test-context'

describe('createContext', () => {
  it('provides defaults', () => {
    const context = createContext()
    const expectedFormat = process.stdout.isTTY ? 'text' : 'json'

    expect(context.stdin).toBe(process.stdin)
    expect(context.stdout).toBe(process.stdout)
    expect(context.stderr).toBe(process.stderr)
    expect(context.format).toBe(expectedFormat)
    expect(context.verbose).toBe(false)
    expect(context.quiet).toBe(false)
    expect(context.signal.aborted).toBe(false)
    expect(typeof context.getTriageService).toBe('function')
  })

  it('accepts overrides', async () => {
    const stdin = new PassThrough() as unknown as NodeJS.ReadStream
    const stdout = new PassThrough() as unknown as NodeJS.WriteStream
    const service = createFakeService()
    const getTriageService = vi.fn().mockResolvedValue(service)

    const context = createContext({
      stdin,
      stdout,
      format: 'table',
      verbose: true,
      getTriageService,
    })

    expect(context.stdin).toBe(stdin)
    expect(context.stdout).toBe(stdout)
    expect(context.format).toBe('table')
    expect(context.verbose).toBe(true)
    await expect(context.getTriageService()).resolves.toBe(service)
  })
})

describe('contextFromCommand', () => {
  function parseWith(args: string[]) {
    const program = new Command()
    program
      .option('-f, --format <format>')
      .option('-v, --verbose')
      .option('-q, --quiet')
    let captured: ReturnType<typeof contextFromCommand> | undefined
    program
      .command('run')
      .option('--json')
      .action((options: { json?: boolean }, command: Command) => {
        captured = contextFromCommand(command, options.json)
      })
    program.parse(['node', 'inbox-triage', ...args])
    return captured
  }

  it('reads global flags from the parent program', () => {
    const ctx = parseWith(['--format', 'table', '--quiet', 'run'])

    expect(ctx?.format).toBe('table')
    expect(ctx?.quiet).toBe(true)
    expect(ctx?.verbose).toBe(false)
  })

  it('lets --json override the global format', () => {
    const ctx = parseWith(['--format', 'table', 'run', '--json'])

    expect(ctx?.format).toBe('json')
  })

  it('carries the abort signal it is given', () => {
    const controller = new AbortController()
    const program = new Command()
    let captured: ReturnType<typeof contextFromCommand> | undefined
    program.command('run').action((_options: unknown, command: Command) => {
      captured = contextFromCommand(command, false, controller.signal)
    })
    program.parse(['node', 'inbox-triage', 'run'])

    controller.abort()

    expect(captured?.signal).toBe(controller.signal)
    expect(captured?.signal.aborted).toBe(true)
  })

  it('ignores an unknown format', () => {
    const ctx = parseWith(['--format', 'yaml', 'run'])
    const expectedFormat = process.stdout.isTTY ? 'text' : 'json'

    expect(ctx?.format).toBe(expectedFormat)
  })
})
