import { extensionOf, mimeForExtension } from '@/db/layout'
import type { ChunkAnalysis, PipelineTaskArgs } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { mergeJobId, sessionKeys, type CoordinationStore } from './coordination'
import type { EnrichmentOracle } from './enrichment-oracle'
import { describeError, errorMessage } from './errors'
import type { JobScheduler } from './jobs'
import type { SessionRecords } from './session-records'

export type EnrichOutcome =
  | { status: 'processed'; index: number; processedCount: number; mergeScheduled: boolean; segmentCount: number }
  | { status: 'failed'; index: number; error: string }

export type ChunkWorkerOptions = {
  keyPrefix: string
  log?: DiagnosticLogger
}

export class ChunkWorker {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly store: DurableStore,
    private readonly coordination: CoordinationStore,
    private readonly records: SessionRecords,
    private readonly oracle: EnrichmentOracle,
    private readonly scheduler: JobScheduler<PipelineTaskArgs>,
    private readonly options: ChunkWorkerOptions,
  ) {
    this.log = options.log ?? createDiagnosticLogger('chunk-worker')
  }

  async enrich(args: PipelineTaskArgs['enrichChunk']): Promise<EnrichOutcome> {
    const { ref, subjectId, sessionId, index, totalExpected } = args
    const keys = sessionKeys(this.options.keyPrefix, subjectId, sessionId)

    const bytes = await this.store.get(ref)
    let segmentCount = 0
    if (!bytes) {
      // Counted anyway so the merge still fires and the gap shows in its output.
      this.log('error', 'chunk:missing', { subjectId, sessionId, index, ref })
    } else {
      let analysis: ChunkAnalysis
      try {
        analysis = await this.oracle.analyzeChunk({
          ref,
          index,
          bytes,
          mimeType: mimeForExtension(extensionOf(ref) ?? ''),
        })
      } catch (error) {
        this.log('error', 'chunk:failed', { subjectId, sessionId, index, error: describeError(error) })
        return { status: 'failed', index, error: errorMessage(error) }
      }
      // Storage errors propagate with their own code.
      await this.records.saveChunkResult(subjectId, sessionId, {
        index,
        ref,
        analysis,
        processedAt: new Date().toISOString(),
      })
      segmentCount = analysis.segments.length
    }

    const processedCount = await this.coordination.incr(keys.processed)
    let mergeScheduled = false
    if (processedCount === totalExpected) {
      const receipt = await this.scheduler.enqueue(
        'merge',
        { subjectId, sessionId, totalExpected },
        { idempotencyKey: mergeJobId(subjectId, sessionId) },
      )
      mergeScheduled = receipt.accepted
      this.log('log', 'merge:submitted', { subjectId, sessionId, jobId: receipt.jobId, accepted: receipt.accepted })
    }
    this.log('log', 'chunk:processed', { subjectId, sessionId, index, processedCount, segmentCount })
    return { status: 'processed', index, processedCount, mergeScheduled, segmentCount }
  }
}
