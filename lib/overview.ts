import type { SessionInsight, SubjectMemory } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { EnrichmentOracle } from './enrichment-oracle'
import { describeError } from './errors'
import type { SessionRecords } from './session-records'

export type OverviewLimits = {
  minChars: number
  maxChars: number
  historyLimit: number
}

const SENTENCE_ENDINGS = '.!?"\''

function lastSentenceBoundary(text: string) {
  return Math.max(text.lastIndexOf('.'), text.lastIndexOf('!'), text.lastIndexOf('?'))
}

export function summarizeHistoricalInsights(insights: SessionInsight[]) {
  if (!insights.length) return 'No prior sessions available.'

  const mentions = new Map<string, number>()
  const intents: string[] = []
  for (const insight of insights) {
    for (const product of insight.extractedEntities) {
      mentions.set(product, (mentions.get(product) ?? 0) + 1)
    }
    if (insight.subjectIntent) intents.push(insight.subjectIntent)
  }

  const lines = [`Total sessions analyzed: ${insights.length}`]
  if (mentions.size) {
    const top = Array.from(mentions.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, 3)
      .map(([product, count]) => `${product} (${count}x)`)
    lines.push(`Most discussed products: ${top.join(', ')}`)
  }
  if (intents.length) {
    lines.push(`Recent intents: ${intents.slice(0, 3).join('; ')}`)
  }
  return lines.join('\n')
}

/** Plain overview assembled from memory when the narrator has nothing usable. */
export function fallbackOverview(memory: SubjectMemory, maxChars = 500) {
  const parts: string[] = []
  const profile = Object.entries(memory.profile).slice(0, 2)
  if (profile.length) {
    parts.push(profile.map(([key, value]) => `${key}: ${value}`).join(', '))
  }
  if (memory.activeFinancialGoals.length) {
    parts.push(`Goals: ${memory.activeFinancialGoals.slice(0, 2).map((goal) => goal.name).join(', ')}`)
  }
  const products = Object.entries(memory.discussedProducts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 2)
  if (products.length) {
    parts.push(`Interested in: ${products.map(([name]) => name).join(', ')}`)
  }
  if (memory.riskProfile) {
    parts.push(`Risk profile: ${memory.riskProfile}`)
  }

  let overview = parts.join('. ')
  if (overview.length > maxChars) {
    overview = `${overview.slice(0, maxChars - 3)}...`
  }
  return overview || `Client ${memory.subjectId}`
}

/**
 * Clean up narrator output. Returns null when what is left is too short to
 * stand on its own; the caller picks the replacement.
 */
export function finalizeOverview(raw: string, limits: Pick<OverviewLimits, 'minChars' | 'maxChars'>): string | null {
  let overview = raw.trim().replace(/^["'`]+/, '').replace(/["'`]+$/, '').trim()
  if (overview.length < limits.minChars) return null

  if (!SENTENCE_ENDINGS.includes(overview.charAt(overview.length - 1))) {
    const boundary = lastSentenceBoundary(overview)
    if (boundary + 1 >= limits.minChars) {
      overview = overview.slice(0, boundary + 1)
    }
  }

  if (overview.length > limits.maxChars) {
    const truncated = overview.slice(0, limits.maxChars)
    const boundary = lastSentenceBoundary(truncated)
    overview =
      boundary > Math.floor(limits.maxChars * 0.6)
        ? truncated.slice(0, boundary + 1)
        : `${truncated.slice(0, limits.maxChars - 3)}...`
  }
  return overview
}

export class OverviewNarrator {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly records: SessionRecords,
    private readonly oracle: EnrichmentOracle,
    private readonly limits: OverviewLimits,
    log?: DiagnosticLogger,
  ) {
    this.log = log ?? createDiagnosticLogger('overview')
  }

  private async loadHistory(subjectId: string) {
    if (this.limits.historyLimit <= 0) return []
    const sessionIds = await this.records.listSessionIds(subjectId)
    const recent = [...sessionIds].sort().reverse().slice(0, this.limits.historyLimit)
    const insights: SessionInsight[] = []
    for (const sessionId of recent) {
      const insight = await this.records.loadInsight(subjectId, sessionId)
      if (insight) insights.push(insight)
    }
    return insights
  }

  private keepOrFallback(memory: SubjectMemory) {
    return memory.overview || fallbackOverview(memory, this.limits.maxChars)
  }

  /** Never throws: any failure keeps the previous overview or builds one from memory. */
  async refresh(memory: SubjectMemory, insight: SessionInsight): Promise<string> {
    const { subjectId } = memory
    try {
      const history = summarizeHistoricalInsights(await this.loadHistory(subjectId))
      const raw = await this.oracle.narrateOverview({ memory, insight, history, maxChars: this.limits.maxChars })
      const overview = finalizeOverview(raw, this.limits)
      if (!overview) {
        this.log('error', 'narrate:too-short', { subjectId, length: raw.trim().length })
        return this.keepOrFallback(memory)
      }
      this.log('log', 'narrate:success', { subjectId, length: overview.length })
      return overview
    } catch (error) {
      this.log('error', 'narrate:failure', { subjectId, error: describeError(error) })
      return this.keepOrFallback(memory)
    }
  }
}
