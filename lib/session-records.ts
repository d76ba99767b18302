import { z } from 'zod'
import {
  chunkResultKey,
  decodeSegment,
  eventKey,
  insightKey,
  memoryKey,
  sessionsDir,
} from '@/db/layout'
import type { ChunkResult, SessionEvent, SessionInsight, SubjectMemory } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { errorMessage } from './errors'
import { defaultMemory, insightToWire, normalizeChunkAnalysis, normalizeInsight, normalizeMemory } from './normalize'

const JSON_CONTENT_TYPE = 'application/json'

const chunkResultSchema = z.object({
  index: z.number().int().nonnegative(),
  ref: z.string(),
  analysis: z.unknown().transform((value) => normalizeChunkAnalysis(value)),
  processedAt: z.string(),
})

const eventSchema = z.object({
  sessionId: z.string(),
  subjectId: z.string(),
  timestamp: z.string(),
  sourceRefs: z.array(z.string()),
  mergedText: z.string(),
  speakerMap: z.record(z.string()),
})

/**
 * The three persisted layers plus per-chunk results, all as JSON documents
 * in the durable store. Every write is a by-key overwrite.
 */
export class SessionRecords {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly store: DurableStore,
    log?: DiagnosticLogger,
  ) {
    this.log = log ?? createDiagnosticLogger('session-records')
  }

  private async writeJson(key: string, value: unknown) {
    await this.store.put(key, Buffer.from(JSON.stringify(value, null, 2), 'utf8'), JSON_CONTENT_TYPE)
    this.log('log', 'write:success', { key })
  }

  private async readJson(key: string): Promise<unknown> {
    const buffer = await this.store.get(key)
    if (!buffer) return undefined
    try {
      return JSON.parse(buffer.toString('utf8'))
    } catch (error) {
      this.log('error', 'read:invalid-json', { key, error: errorMessage(error) })
      return undefined
    }
  }

  async saveChunkResult(subjectId: string, sessionId: string, result: ChunkResult) {
    await this.writeJson(chunkResultKey(subjectId, sessionId, result.index), result)
  }

  async loadChunkResult(subjectId: string, sessionId: string, index: number): Promise<ChunkResult | null> {
    const key = chunkResultKey(subjectId, sessionId, index)
    const raw = await this.readJson(key)
    if (raw === undefined) return null
    const parsed = chunkResultSchema.safeParse(raw)
    if (!parsed.success) {
      this.log('error', 'chunk-result:invalid', { key, issues: parsed.error.issues.length })
      return null
    }
    return parsed.data
  }

  async saveEvent(event: SessionEvent) {
    await this.writeJson(eventKey(event.subjectId, event.sessionId), event)
  }

  async loadEvent(subjectId: string, sessionId: string): Promise<SessionEvent | null> {
    const raw = await this.readJson(eventKey(subjectId, sessionId))
    if (raw === undefined) return null
    const parsed = eventSchema.safeParse(raw)
    return parsed.success ? parsed.data : null
  }

  async saveInsight(subjectId: string, insight: SessionInsight) {
    await this.writeJson(insightKey(subjectId, insight.sessionId), insightToWire(insight))
  }

  async loadInsight(subjectId: string, sessionId: string): Promise<SessionInsight | null> {
    const raw = await this.readJson(insightKey(subjectId, sessionId))
    return raw === undefined ? null : normalizeInsight(raw, sessionId)
  }

  /** Memory is created lazily: an unknown subject gets the default record. */
  async loadMemory(subjectId: string): Promise<SubjectMemory> {
    const raw = await this.readJson(memoryKey(subjectId))
    if (raw === undefined) {
      this.log('log', 'memory:initialized', { subjectId })
      return defaultMemory(subjectId)
    }
    return normalizeMemory(raw, subjectId)
  }

  async saveMemory(memory: SubjectMemory) {
    await this.writeJson(memoryKey(memory.subjectId), memory)
  }

  async listSessionIds(subjectId: string): Promise<string[]> {
    const entries = await this.store.list(sessionsDir(subjectId))
    return entries.map(decodeSegment)
  }
}
