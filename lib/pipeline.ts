import { z } from 'zod'
import type { PipelineTaskArgs } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { ChunkIntake } from './chunk-intake'
import { ChunkWorker } from './chunk-worker'
import type { PipelineConfig } from './config'
import type { CoordinationStore } from './coordination'
import { Dispatcher } from './dispatcher'
import { EnrichmentOracle, type EnrichmentBackend } from './enrichment-oracle'
import { PipelineError } from './errors'
import type { JobScheduler, TaskHandlers } from './jobs'
import { OverviewNarrator, type OverviewLimits } from './overview'
import type { TaskSchemas } from './redis-jobs'
import { SessionMerger } from './session-merge'
import { SessionRecords } from './session-records'
import { SessionStatusReader } from './session-status'

export type PipelineSettings = {
  keyPrefix: string
  chunkExtensions: string[]
  overview: OverviewLimits
}

export type PipelineDeps = {
  store: DurableStore
  coordination: CoordinationStore
  scheduler: JobScheduler<PipelineTaskArgs>
  backend: EnrichmentBackend
  settings: PipelineSettings
  log?: DiagnosticLogger
}

const sessionTarget = {
  subjectId: z.string().min(1),
  sessionId: z.string().min(1),
  totalExpected: z.number().int().positive(),
}

export const pipelineTaskSchemas: TaskSchemas<PipelineTaskArgs> = {
  dispatch: z.object(sessionTarget),
  enrichChunk: z.object({ ...sessionTarget, ref: z.string().min(1), index: z.number().int().nonnegative() }),
  merge: z.object(sessionTarget),
}

export function pipelineSettings(config: PipelineConfig): PipelineSettings {
  return {
    keyPrefix: config.redis.keyPrefix,
    chunkExtensions: config.chunkExtensions,
    overview: config.overview,
  }
}

/**
 * Wire every component over the given stores. The returned `handlers` are
 * what a scheduler runs; each one throws when its operation reports failure
 * so the scheduler records the job as failed.
 */
export function createPipeline(deps: PipelineDeps) {
  const { store, coordination, scheduler, settings } = deps
  const scoped = (scope: string) => deps.log ?? createDiagnosticLogger(scope)
  const { keyPrefix, chunkExtensions: extensions } = settings

  const records = new SessionRecords(store, scoped('session-records'))
  const oracle = new EnrichmentOracle(deps.backend, scoped('enrichment-oracle'))
  const narrator = new OverviewNarrator(records, oracle, settings.overview, scoped('overview'))

  const intake = new ChunkIntake(store, coordination, scheduler, { keyPrefix, extensions, log: scoped('chunk-intake') })
  const dispatcher = new Dispatcher(store, coordination, scheduler, { keyPrefix, extensions, log: scoped('dispatcher') })
  const worker = new ChunkWorker(store, coordination, records, oracle, scheduler, { keyPrefix, log: scoped('chunk-worker') })
  const merger = new SessionMerger(store, coordination, records, oracle, narrator, {
    keyPrefix,
    extensions,
    log: scoped('session-merge'),
  })
  const status = new SessionStatusReader(coordination, records, keyPrefix, scoped('session-status'))

  const handlers: TaskHandlers<PipelineTaskArgs> = {
    dispatch: async ({ subjectId, sessionId, totalExpected }) => dispatcher.dispatch(subjectId, sessionId, totalExpected),
    enrichChunk: async (args) => {
      const outcome = await worker.enrich(args)
      if (outcome.status === 'failed') {
        throw new PipelineError('oracle_failed', outcome.error, { details: { index: outcome.index } })
      }
      return outcome
    },
    merge: async ({ subjectId, sessionId, totalExpected }) => {
      const outcome = await merger.merge(subjectId, sessionId, totalExpected)
      if (!outcome.ok) {
        throw new PipelineError('merge_failed', outcome.error)
      }
      return outcome
    },
  }

  return { records, oracle, narrator, intake, dispatcher, worker, merger, status, handlers }
}

export type Pipeline = ReturnType<typeof createPipeline>
