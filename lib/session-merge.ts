import type { ChunkResult, SessionEvent, SessionInsight, TranscriptSegment } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { sessionKeys, type CoordinationStore } from './coordination'
import { resolveChunkRef } from './dispatcher'
import type { EnrichmentOracle } from './enrichment-oracle'
import { PipelineError, describeError, errorMessage } from './errors'
import { reduceMemory } from './memory-reducer'
import { insightToWire } from './normalize'
import type { OverviewNarrator } from './overview'
import type { SessionRecords } from './session-records'

export type MergeOutcome = { ok: true; insight: SessionInsight } | { ok: false; error: string }

export type SessionMergerOptions = {
  keyPrefix: string
  extensions: string[]
  log?: DiagnosticLogger
}

const UNASSIGNED_SPEAKER = 'unassigned'

export function formatTranscriptLine(segment: TranscriptSegment) {
  return `[${segment.timestamp}] ${segment.speaker}: ${segment.content}`
}

/** `sourceRefs` names every chunk of the session, including ones with no result. */
export function buildSessionEvent(
  subjectId: string,
  sessionId: string,
  sourceRefs: string[],
  results: ChunkResult[],
): SessionEvent {
  const segments = results.flatMap((result) => result.analysis.segments)
  const speakerMap: Record<string, string> = {}
  for (const segment of segments) {
    speakerMap[segment.speaker] = UNASSIGNED_SPEAKER
  }
  return {
    subjectId,
    sessionId,
    timestamp: new Date().toISOString(),
    sourceRefs,
    mergedText: segments.map(formatTranscriptLine).join('\n'),
    speakerMap,
  }
}

/**
 * Fan-in: turns the stored chunk results of a session into the event,
 * insight and memory layers, then publishes the outcome for pollers.
 */
export class SessionMerger {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly store: DurableStore,
    private readonly coordination: CoordinationStore,
    private readonly records: SessionRecords,
    private readonly oracle: EnrichmentOracle,
    private readonly narrator: OverviewNarrator,
    private readonly options: SessionMergerOptions,
  ) {
    this.log = options.log ?? createDiagnosticLogger('session-merge')
  }

  private async collectResults(subjectId: string, sessionId: string, totalExpected: number) {
    const results: ChunkResult[] = []
    const refs: string[] = []
    const missing: number[] = []
    for (let index = 0; index < totalExpected; index += 1) {
      const result = await this.records.loadChunkResult(subjectId, sessionId, index)
      if (result) {
        results.push(result)
        refs.push(result.ref)
      } else {
        missing.push(index)
        refs.push(await resolveChunkRef(this.store, this.options.extensions, subjectId, sessionId, index))
      }
    }
    if (missing.length) {
      this.log('error', 'merge:missing-chunks', { subjectId, sessionId, missing })
    }
    return { results, refs }
  }

  async merge(subjectId: string, sessionId: string, totalExpected: number): Promise<MergeOutcome> {
    const keys = sessionKeys(this.options.keyPrefix, subjectId, sessionId)
    try {
      const { results, refs } = await this.collectResults(subjectId, sessionId, totalExpected)
      const event = buildSessionEvent(subjectId, sessionId, refs, results)
      await this.records.saveEvent(event)

      const insight = await this.oracle.analyzeSession(event.mergedText, sessionId)
      await this.records.saveInsight(subjectId, insight)

      const previous = await this.records.loadMemory(subjectId)
      const memory = reduceMemory(previous, insight)
      await this.records.saveMemory(memory)

      const overview = await this.narrator.refresh(memory, insight)
      await this.records.saveMemory({ ...memory, overview })

      const segments = results.flatMap((result) => result.analysis.segments)
      await this.coordination.set(keys.result, JSON.stringify(insightToWire(insight)))
      await this.coordination.set(keys.segments, JSON.stringify(segments))
      await this.coordination.remove(keys.error)
      this.log('log', 'merge:complete', { subjectId, sessionId, chunks: results.length, confidence: insight.confidence })
      return { ok: true, insight }
    } catch (error) {
      const failure = new PipelineError('merge_failed', `Merge failed for ${subjectId}/${sessionId}: ${errorMessage(error)}`, {
        cause: error,
      })
      this.log('error', 'merge:failure', { subjectId, sessionId, error: describeError(failure) })
      try {
        await this.coordination.set(keys.error, failure.message)
        await this.coordination.remove(keys.result)
      } catch (publishError) {
        this.log('error', 'merge:publish-failure', { subjectId, sessionId, error: describeError(publishError) })
      }
      return { ok: false, error: failure.message }
    }
  }
}
