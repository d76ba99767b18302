import type { ChunkAnalysis, SessionInsight, SubjectMemory } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { OracleConfig } from './config'
import { PipelineError, errorMessage } from './errors'
import { GeminiBackend } from './gemini-backend'
import { emptyInsight, normalizeChunkAnalysis, normalizeInsight } from './normalize'
import { OpenAiBackend } from './openai-backend'

export type ChunkSource = {
  ref: string
  index: number
  bytes: Buffer
  mimeType: string
}

export type OverviewContext = {
  memory: SubjectMemory
  insight: SessionInsight
  history: string
  maxChars: number
}

/**
 * A model provider. Backends return whatever the provider produced (JSON
 * text or an object); typing and defaults are applied by EnrichmentOracle.
 */
export type EnrichmentBackend = {
  readonly name: string
  transcribeChunk(source: ChunkSource): Promise<unknown>
  analyzeSession(mergedText: string, sessionId: string): Promise<unknown>
  narrateOverview(context: OverviewContext): Promise<string>
}

export class EnrichmentOracle {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly backend: EnrichmentBackend,
    log?: DiagnosticLogger,
  ) {
    this.log = log ?? createDiagnosticLogger('enrichment-oracle', { backend: backend.name })
  }

  get backendName() {
    return this.backend.name
  }

  async analyzeChunk(source: ChunkSource): Promise<ChunkAnalysis> {
    let raw: unknown
    try {
      raw = await this.backend.transcribeChunk(source)
    } catch (error) {
      this.log('error', 'chunk:failure', { ref: source.ref, error: errorMessage(error) })
      throw new PipelineError('oracle_failed', `Chunk analysis failed for ${source.ref}: ${errorMessage(error)}`, { cause: error })
    }
    const analysis = normalizeChunkAnalysis(raw)
    this.log('log', 'chunk:success', { ref: source.ref, segments: analysis.segments.length })
    return analysis
  }

  async analyzeSession(mergedText: string, sessionId: string): Promise<SessionInsight> {
    if (!mergedText.trim()) {
      this.log('log', 'session:empty-transcript', { sessionId })
      return emptyInsight(sessionId)
    }
    let raw: unknown
    try {
      raw = await this.backend.analyzeSession(mergedText, sessionId)
    } catch (error) {
      this.log('error', 'session:failure', { sessionId, error: errorMessage(error) })
      throw new PipelineError('oracle_failed', `Session analysis failed for ${sessionId}: ${errorMessage(error)}`, { cause: error })
    }
    const insight = normalizeInsight(raw, sessionId)
    this.log('log', 'session:success', { sessionId, confidence: insight.confidence, bullets: insight.summaryBullets.length })
    return insight
  }

  async narrateOverview(context: OverviewContext): Promise<string> {
    try {
      return await this.backend.narrateOverview(context)
    } catch (error) {
      throw new PipelineError('oracle_failed', `Overview narration failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}

export function createEnrichmentBackend(config: OracleConfig): EnrichmentBackend {
  if (config.provider === 'openai') {
    return new OpenAiBackend(config)
  }
  return new GeminiBackend(config)
}
