import Redis from 'ioredis'
import type { PipelineTaskArgs } from '@/types/pipeline'
import { createStorageClient } from '@/utils/storage-env'
import { createDiagnosticLogger } from '@/utils/diagnostics'
import { SupabaseBlobStore } from './blob'
import { describePipelineConfig, loadPipelineConfig } from './config'
import { RedisCoordinationStore } from './coordination'
import { createEnrichmentBackend } from './enrichment-oracle'
import { PipelineError } from './errors'
import { createPipeline, pipelineSettings, pipelineTaskSchemas } from './pipeline'
import { RedisJobScheduler } from './redis-jobs'

const log = createDiagnosticLogger('worker')

/**
 * Long-running worker process: pulls dispatch, enrichment and merge jobs off
 * the Redis queue until SIGINT or SIGTERM.
 */
export async function startWorker(env: NodeJS.ProcessEnv = process.env) {
  const config = loadPipelineConfig(env)
  log('log', 'config', describePipelineConfig(config))
  if (!config.storage) {
    throw new PipelineError('config_invalid', 'The worker requires Supabase storage (SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, SUPABASE_STORAGE_BUCKET)')
  }

  // Blocking pops must not hit the per-request retry limit.
  const redis = new Redis(config.redis.url, { maxRetriesPerRequest: null })
  const store = new SupabaseBlobStore(createStorageClient(config.storage), config.storage.bucket)
  const scheduler = new RedisJobScheduler<PipelineTaskArgs>(redis, pipelineTaskSchemas, {
    queueName: config.redis.queueName,
    maxAttempts: config.redis.jobAttempts,
    jobKeyTtlSeconds: config.redis.jobKeyTtlSeconds,
  })
  const pipeline = createPipeline({
    store,
    coordination: new RedisCoordinationStore(redis),
    scheduler,
    backend: createEnrichmentBackend(config.oracle),
    settings: pipelineSettings(config),
  })

  const shutdown = (signal: string) => {
    log('log', 'shutdown:requested', { signal })
    scheduler.stop()
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  try {
    await scheduler.work(pipeline.handlers)
  } finally {
    await redis.quit()
    log('log', 'shutdown:complete')
  }
}
