import { chunkBlobKey } from '@/db/layout'
import type { PipelineTaskArgs } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { sessionKeys, type CoordinationStore } from './coordination'
import type { JobScheduler } from './jobs'

export type DispatcherOptions = {
  keyPrefix: string
  extensions: string[]
  log?: DiagnosticLogger
}

/**
 * Key of a stored chunk. The first configured extension that exists wins;
 * when none is found the first one is returned and readers see it as missing.
 */
export async function resolveChunkRef(
  store: DurableStore,
  extensions: string[],
  subjectId: string,
  sessionId: string,
  index: number,
) {
  for (const extension of extensions) {
    const key = chunkBlobKey(subjectId, sessionId, index, extension)
    if (await store.exists(key)) return key
  }
  return chunkBlobKey(subjectId, sessionId, index, extensions[0] ?? '.webm')
}

/** Fans a complete session out into one enrichment job per chunk. */
export class Dispatcher {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly store: DurableStore,
    private readonly coordination: CoordinationStore,
    private readonly scheduler: JobScheduler<PipelineTaskArgs>,
    private readonly options: DispatcherOptions,
  ) {
    this.log = options.log ?? createDiagnosticLogger('dispatcher')
  }

  async dispatch(subjectId: string, sessionId: string, totalExpected: number): Promise<number> {
    const keys = sessionKeys(this.options.keyPrefix, subjectId, sessionId)
    await this.coordination.set(keys.processed, '0')
    await this.coordination.remove(keys.result)
    await this.coordination.remove(keys.error)

    let scheduled = 0
    for (let index = 0; index < totalExpected; index += 1) {
      const ref = await resolveChunkRef(this.store, this.options.extensions, subjectId, sessionId, index)
      await this.scheduler.enqueue('enrichChunk', { subjectId, sessionId, ref, index, totalExpected })
      scheduled += 1
    }
    this.log('log', 'dispatch:scheduled', { subjectId, sessionId, scheduled })
    return scheduled
  }
}
