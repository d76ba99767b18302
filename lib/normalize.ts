import { z } from 'zod'
import {
  CONFIDENCE_LEVELS,
  CONFIDENCE_TRENDS,
  EMOTIONS,
  ENGAGEMENT_LEVELS,
  type ChunkAnalysis,
  type ConfidenceTrend,
  type SessionInsight,
  type SubjectMemory,
  type TranscriptSegment,
} from '@/types/pipeline'

const MAX_SUMMARY_BULLETS = 5
const MIN_SUMMARY_BULLETS = 3

function cleanText(value: unknown): string {
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return ''
}

const text = (fallback = '') => z.unknown().transform((value) => cleanText(value) || fallback)

const nullableText = z.unknown().transform((value) => cleanText(value) || null)

const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.map(cleanText).filter((item) => item.length > 0))

const flag = z.unknown().transform((value) => value === true || value === 'true')

function enumOf<const T extends readonly [string, ...string[]]>(values: T) {
  return z.unknown().transform((value): T[number] | null => {
    const candidate = cleanText(value).toLowerCase()
    return values.find((entry) => entry === candidate) ?? null
  })
}

const textRecord = z
  .record(z.unknown())
  .catch({})
  .transform((entries) => {
    const result: Record<string, string> = {}
    for (const [key, value] of Object.entries(entries)) {
      const name = key.trim()
      if (!name || value === null || value === undefined) continue
      result[name] = typeof value === 'object' ? JSON.stringify(value) : cleanText(value)
    }
    return result
  })

const countRecord = z
  .record(z.unknown())
  .catch({})
  .transform((entries) => {
    const result: Record<string, number> = {}
    for (const [key, value] of Object.entries(entries)) {
      const count = typeof value === 'number' ? value : Number.parseInt(cleanText(value), 10)
      if (key.trim() && Number.isFinite(count) && count > 0) result[key.trim()] = Math.floor(count)
    }
    return result
  })

const goalList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => {
      if (!item || typeof item !== 'object') return []
      const name = 'name' in item ? cleanText(item.name) : ''
      const status = 'status' in item ? cleanText(item.status) : ''
      return name && status ? [{ name, status }] : []
    }),
  )

const isoDate = z.unknown().transform((value) => {
  const candidate = cleanText(value)
  if (!/^\d{4}-\d{2}-\d{2}$/.test(candidate)) return null
  return Number.isNaN(Date.parse(`${candidate}T00:00:00Z`)) ? null : candidate
})

// Bullets are either absent or between three and five.
const summaryBullets = textList.transform((bullets) =>
  bullets.length < MIN_SUMMARY_BULLETS ? [] : bullets.slice(0, MAX_SUMMARY_BULLETS),
)

const levelOrMedium = enumOf(CONFIDENCE_LEVELS).transform((value) => value ?? 'medium')

const segmentSchema = z.object({
  speaker: text('Unknown'),
  timestamp: text(),
  content: text(),
  language: text('unknown'),
  emotion: enumOf(EMOTIONS).transform((value) => value ?? 'neutral'),
  translation: nullableText,
})

const chunkAnalysisSchema = z.object({
  summary: text(),
  segments: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item): TranscriptSegment[] => {
        const parsed = segmentSchema.safeParse(item)
        return parsed.success && parsed.data.content ? [parsed.data] : []
      }),
    ),
})

// Wire keys are the ones the analysis prompts ask for.
const insightSchema = z.object({
  is_relevant: flag,
  extracted_entities: textList,
  subject_intent: text(),
  summary_bullets: summaryBullets,
  action_items: textList,
  follow_ups: textList,
  follow_up_date: isoDate,
  confidence: enumOf(CONFIDENCE_LEVELS),
  stated_confidence: enumOf(CONFIDENCE_LEVELS),
  profile_updates: textRecord,
  goals: goalList,
  completed_action_items: textList,
  preferred_products: textList,
  disfavored_products: textList,
  objections: textList,
  risk_profile: z.unknown().transform((value) => (value && typeof value === 'object' ? JSON.stringify(value) : cleanText(value) || null)),
  engagement_level: enumOf(ENGAGEMENT_LEVELS),
  confidence_trend: z.unknown().transform((value) => normalizeTrend(value)),
})

const memorySchema = z.object({
  profile: textRecord,
  riskProfile: z.unknown().transform((value) => (value && typeof value === 'object' ? JSON.stringify(value) : cleanText(value) || null)),
  preferredProducts: textList,
  disfavoredProducts: textList,
  activeFinancialGoals: goalList,
  discussedProducts: countRecord,
  objectionsHistory: textList,
  decisionConfidenceTrend: z.unknown().transform((value) => normalizeTrend(value) ?? 'stable'),
  engagementLevel: enumOf(ENGAGEMENT_LEVELS).transform((value) => value ?? 'medium'),
  pendingActionItems: textList,
  lastFollowUpDate: isoDate,
  lastUpdatedFromSessionId: nullableText,
  memoryConfidence: levelOrMedium,
  overview: text(),
})

function asObject(raw: unknown): Record<string, unknown> {
  return raw && typeof raw === 'object' && !Array.isArray(raw) ? Object.fromEntries(Object.entries(raw)) : {}
}

/**
 * Maps trend wording onto the enum. Sentiment words are accepted because the
 * models tend to answer with them; anything else is null.
 */
export function normalizeTrend(value: unknown): ConfidenceTrend | null {
  const candidate = cleanText(value).toLowerCase()
  const exact = CONFIDENCE_TRENDS.find((trend) => trend === candidate)
  if (exact) return exact
  if (candidate === 'positive' || candidate === 'improving') return 'increasing'
  if (candidate === 'negative' || candidate === 'declining') return 'decreasing'
  return null
}

/**
 * Parse model output that may be wrapped in a code fence or surrounded by
 * prose. Returns null when no JSON object can be recovered.
 */
export function parseJsonFromText(raw: string | null | undefined): unknown {
  if (!raw) return null
  const trimmed = raw.trim()
  if (!trimmed.length) return null
  const withoutFence = trimmed.replace(/^```(?:json)?/i, '').replace(/```$/i, '').trim()
  const attempts = [withoutFence]
  const firstBrace = withoutFence.indexOf('{')
  const lastBrace = withoutFence.lastIndexOf('}')
  if (firstBrace !== -1 && lastBrace !== -1 && lastBrace > firstBrace) {
    attempts.push(withoutFence.slice(firstBrace, lastBrace + 1))
  }
  for (const attempt of attempts) {
    const candidate = attempt.trim()
    if (!candidate) continue
    try {
      return JSON.parse(candidate)
    } catch {
      continue
    }
  }
  return null
}

function coerceRaw(raw: unknown) {
  return asObject(typeof raw === 'string' ? parseJsonFromText(raw) : raw)
}

export function normalizeChunkAnalysis(raw: unknown): ChunkAnalysis {
  return chunkAnalysisSchema.parse(coerceRaw(raw))
}

export function emptyInsight(sessionId: string): SessionInsight {
  return normalizeInsight({}, sessionId)
}

/**
 * Stored insights carry `stated_confidence` so a defaulted `low` is not read
 * back as something the oracle said. Oracle output only has `confidence`.
 */
export function normalizeInsight(raw: unknown, sessionId: string): SessionInsight {
  const source = coerceRaw(raw)
  const data = insightSchema.parse(source)
  const statedConfidence = 'stated_confidence' in source ? data.stated_confidence : data.confidence
  return {
    sessionId,
    isRelevant: data.is_relevant,
    extractedEntities: Array.from(new Set(data.extracted_entities)),
    subjectIntent: data.subject_intent,
    summaryBullets: data.summary_bullets,
    actionItems: data.action_items,
    followUps: data.follow_ups,
    followUpDate: data.follow_up_date,
    confidence: data.confidence ?? 'low',
    statedConfidence,
    profileUpdates: data.profile_updates,
    goals: data.goals,
    completedActionItems: data.completed_action_items,
    preferredProducts: data.preferred_products,
    disfavoredProducts: data.disfavored_products,
    objections: data.objections,
    riskProfile: data.risk_profile,
    engagementLevel: data.engagement_level,
    confidenceTrend: data.confidence_trend,
  }
}

// Stored insights keep the wire shape the oracle normalizer reads.
export function insightToWire(insight: SessionInsight) {
  return {
    session_id: insight.sessionId,
    is_relevant: insight.isRelevant,
    extracted_entities: insight.extractedEntities,
    subject_intent: insight.subjectIntent,
    summary_bullets: insight.summaryBullets,
    action_items: insight.actionItems,
    follow_ups: insight.followUps,
    follow_up_date: insight.followUpDate,
    confidence: insight.confidence,
    stated_confidence: insight.statedConfidence,
    profile_updates: insight.profileUpdates,
    goals: insight.goals,
    completed_action_items: insight.completedActionItems,
    preferred_products: insight.preferredProducts,
    disfavored_products: insight.disfavoredProducts,
    objections: insight.objections,
    risk_profile: insight.riskProfile,
    engagement_level: insight.engagementLevel,
    confidence_trend: insight.confidenceTrend,
  }
}

export function normalizeMemory(raw: unknown, subjectId: string): SubjectMemory {
  return { subjectId, ...memorySchema.parse(asObject(raw)) }
}

export function defaultMemory(subjectId: string): SubjectMemory {
  return normalizeMemory({}, subjectId)
}
