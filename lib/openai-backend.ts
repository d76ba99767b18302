import OpenAI, { toFile } from 'openai'
import { extensionOf } from '@/db/layout'
import type { OracleConfig } from './config'
import type { ChunkSource, EnrichmentBackend, OverviewContext } from './enrichment-oracle'
import { buildOverviewPrompt, buildSessionAnalysisPrompt } from './prompts'

type OpenAiOracleConfig = Extract<OracleConfig, { provider: 'openai' }>

export class OpenAiBackend implements EnrichmentBackend {
  readonly name = 'openai'
  private readonly client: OpenAI

  constructor(private readonly config: OpenAiOracleConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey })
  }

  // The transcription endpoint has no diarization or emotion, so each chunk
  // becomes a single segment and the rest is left to the defaults.
  async transcribeChunk(source: ChunkSource) {
    const filename = `chunk-${source.index}${extensionOf(source.ref) ?? '.webm'}`
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(source.bytes, filename, { type: source.mimeType }),
      model: this.config.transcriptionModel,
    })
    const content = transcription.text.trim()
    return {
      summary: '',
      segments: content ? [{ speaker: 'Speaker 1', timestamp: '', content, emotion: 'neutral' }] : [],
    }
  }

  async analyzeSession(mergedText: string, sessionId: string) {
    const completion = await this.client.chat.completions.create({
      model: this.config.model,
      messages: [
        { role: 'system', content: 'You return structured JSON analyses of advisory conversations.' },
        { role: 'user', content: buildSessionAnalysisPrompt(mergedText, sessionId) },
      ],
      response_format: { type: 'json_object' },
    })
    return completion.choices[0]?.message?.content ?? ''
  }

  async narrateOverview(context: OverviewContext) {
    const completion = await this.client.chat.completions.create({
      model: this.config.model,
      messages: [{ role: 'user', content: buildOverviewPrompt(context.memory, context.insight, context.history, context.maxChars) }],
      temperature: 0.7,
    })
    return completion.choices[0]?.message?.content?.trim() ?? ''
  }
}
