/**
 * Wires the triage service from configuration. History goes to MySQL when
 * DATABASE_URL is set, otherwise it lives for the process only.
 */

import { hasDatabaseUrl } from '@inbox-triage/database'
import { type TriageConfig, loadConfig } from '../config/env'
import { DrizzleHistoryStore } from '../history/drizzle-store'
import { MemoryHistoryStore } from '../history/memory-store'
import type { HistoryStore } from '../history/types'
import {
  AxiomMetricsSink,
  JsonlMetricsSink,
  createCompositeMetricsSink,
} from '../metrics/collector'
import { initializeAxiom, log } from '../observability/axiom'
import { createPipeline } from '../pipeline'
import { createDefaultDependencies } from '../pipeline/dependencies'
import { type TriageService, createTriageService } from './triage'

export async function createHistoryStore(): Promise<HistoryStore> {
  if (hasDatabaseUrl()) return new DrizzleHistoryStore()

  await log('warn', 'DATABASE_URL not set, history is kept in memory', {
    workflow: 'triage',
  })
  return new MemoryHistoryStore()
}

export async function createDefaultTriageService(
  config: TriageConfig = loadConfig()
): Promise<TriageService> {
  initializeAxiom()

  const history = await createHistoryStore()
  const metrics = createCompositeMetricsSink([
    new AxiomMetricsSink(),
    new JsonlMetricsSink(config.metricsLogPath),
  ])

  const pipeline = createPipeline(
    createDefaultDependencies(config, { history, metrics }),
    {
      retrievalLimit: config.retrievalLimit,
      maxRetries: config.maxRetries,
      stageTimeoutMs: config.stageTimeoutMs,
    }
  )

  return createTriageService({
    pipeline,
    history,
    metricsLogPath: config.metricsLogPath,
  })
}
