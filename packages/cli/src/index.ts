#!/usr/bin/env tsx

/**
 * inbox-triage CLI
 *
 * Loads .env.local / .env from the working directory before anything
 * validates the environment, then hands off to commander.
 */

import { applyEnv, loadPlaintextEnv } from './core/config-loader'

applyEnv(loadPlaintextEnv(process.cwd()))

const { Command } = await import('commander')
const { closeDb, flushAxiom, VERSION } = await import('@inbox-triage/core')
const { registerHealthCommand } = await import('./commands/health')
const { registerHistoryCommands } = await import('./commands/history')
const { registerKbCommands } = await import('./commands/kb')
const { registerMetricsCommand } = await import('./commands/metrics')
const { registerProcessCommand } = await import('./commands/process-email')
const { registerStatsCommand } = await import('./commands/stats')

const program = new Command()

program
  .name('inbox-triage')
  .description('Triage inbound email: classify, research, draft and decide')
  .version(VERSION)
  .option('-f, --format <format>', 'Output format (json|text|table)')
  .option('-v, --verbose', 'Enable verbose output')
  .option('-q, --quiet', 'Suppress non-error output')

program.addHelpText(
  'after',
  '\n  Examples:\n' +
    '    inbox-triage process --file email.txt\n' +
    '    cat email.txt | inbox-triage process --priority high\n' +
    '    inbox-triage history list --limit 20\n'
)

registerProcessCommand(program)
registerHistoryCommands(program)
registerStatsCommand(program)
registerMetricsCommand(program)
registerKbCommands(program)
registerHealthCommand(program)

// Flush traces and close DB connections when done
await program.parseAsync().finally(async () => {
  await flushAxiom()
  await closeDb()
})
