import type { OracleConfig } from './config'
import type { ChunkSource, EnrichmentBackend, OverviewContext } from './enrichment-oracle'
import { getGoogleModel } from './google'
import { CHUNK_TRANSCRIPTION_PROMPT, buildOverviewPrompt, buildSessionAnalysisPrompt } from './prompts'

type GoogleOracleConfig = Extract<OracleConfig, { provider: 'google' }>

export class GeminiBackend implements EnrichmentBackend {
  readonly name = 'google'

  constructor(private readonly config: GoogleOracleConfig) {}

  private jsonModel() {
    return getGoogleModel(this.config.apiKey, this.config.model, { responseMimeType: 'application/json' })
  }

  async transcribeChunk(source: ChunkSource) {
    // Chunks are small enough to send inline rather than through the file API
    const result = await this.jsonModel().generateContent([
      { inlineData: { mimeType: source.mimeType, data: source.bytes.toString('base64') } },
      { text: CHUNK_TRANSCRIPTION_PROMPT },
    ])
    return result.response.text()
  }

  async analyzeSession(mergedText: string, sessionId: string) {
    const result = await this.jsonModel().generateContent(buildSessionAnalysisPrompt(mergedText, sessionId))
    return result.response.text()
  }

  async narrateOverview(context: OverviewContext) {
    const model = getGoogleModel(this.config.apiKey, this.config.model, { temperature: 0.7 })
    const result = await model.generateContent(
      buildOverviewPrompt(context.memory, context.insight, context.history, context.maxChars),
    )
    return result.response.text()
  }
}
