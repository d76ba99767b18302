import type { ConfidenceLevel, ConfidenceTrend, GoalStatus, SessionInsight, SubjectMemory } from '@/types/pipeline'

const CONFIDENCE_RANK: Record<ConfidenceLevel, number> = { low: 0, medium: 1, high: 2 }

const fold = (value: string) => value.trim().toLowerCase()

function containsFolded(items: string[], candidate: string) {
  const key = fold(candidate)
  return items.some((item) => fold(item) === key)
}

function unionFolded(base: string[], additions: string[]) {
  const result = [...base]
  for (const item of additions) {
    if (!containsFolded(result, item)) result.push(item)
  }
  return result
}

function withoutFolded(items: string[], removals: string[]) {
  return items.filter((item) => !containsFolded(removals, item))
}

function countMentions(counts: Record<string, number>, entities: string[]) {
  const next = { ...counts }
  const seen = new Set<string>()
  for (const entity of entities) {
    if (seen.has(fold(entity))) continue
    seen.add(fold(entity))
    const existing = Object.keys(next).find((name) => fold(name) === fold(entity))
    const key = existing ?? entity
    next[key] = (next[key] ?? 0) + 1
  }
  return next
}

function mergeGoals(current: GoalStatus[], updates: GoalStatus[]) {
  const next = current.map((goal) => ({ ...goal }))
  for (const update of updates) {
    const match = next.find((goal) => fold(goal.name) === fold(update.name))
    if (match) {
      match.status = update.status
    } else {
      next.push({ ...update })
    }
  }
  return next
}

function mergePreferences(memory: SubjectMemory, insight: SessionInsight) {
  let preferred = memory.preferredProducts
  let disfavored = memory.disfavoredProducts
  if (insight.preferredProducts.length) {
    disfavored = withoutFolded(disfavored, insight.preferredProducts)
    preferred = unionFolded(preferred, insight.preferredProducts)
  }
  if (insight.disfavoredProducts.length) {
    preferred = withoutFolded(preferred, insight.disfavoredProducts)
    disfavored = unionFolded(disfavored, insight.disfavoredProducts)
  }
  return { preferred, disfavored }
}

function nextTrend(memory: SubjectMemory, insight: SessionInsight): ConfidenceTrend {
  if (insight.confidenceTrend) return insight.confidenceTrend
  // Nothing to compare when the oracle gave no confidence
  if (!insight.statedConfidence) return memory.decisionConfidenceTrend
  const delta = CONFIDENCE_RANK[insight.statedConfidence] - CONFIDENCE_RANK[memory.memoryConfidence]
  if (delta > 0) return 'increasing'
  if (delta < 0) return 'decreasing'
  return 'stable'
}

/**
 * Fold one session's insight into the subject's memory. Pure: the same inputs
 * always produce the same record and neither argument is mutated.
 *
 * Goals and product preferences only move when the insight carries summary
 * bullets, i.e. the session had enough substance to summarize.
 */
export function reduceMemory(memory: SubjectMemory, insight: SessionInsight): SubjectMemory {
  const substantive = insight.summaryBullets.length > 0
  const preferences = substantive
    ? mergePreferences(memory, insight)
    : { preferred: memory.preferredProducts, disfavored: memory.disfavoredProducts }

  const pending = withoutFolded(unionFolded(memory.pendingActionItems, insight.actionItems), insight.completedActionItems)

  return {
    subjectId: memory.subjectId,
    profile: { ...memory.profile, ...insight.profileUpdates },
    riskProfile: insight.riskProfile ?? memory.riskProfile,
    preferredProducts: [...preferences.preferred],
    disfavoredProducts: [...preferences.disfavored],
    activeFinancialGoals: substantive
      ? mergeGoals(memory.activeFinancialGoals, insight.goals)
      : memory.activeFinancialGoals.map((goal) => ({ ...goal })),
    discussedProducts: countMentions(memory.discussedProducts, insight.extractedEntities),
    objectionsHistory: unionFolded(memory.objectionsHistory, insight.objections),
    decisionConfidenceTrend: nextTrend(memory, insight),
    engagementLevel: insight.engagementLevel ?? 'medium',
    pendingActionItems: pending,
    lastFollowUpDate: insight.followUpDate ?? memory.lastFollowUpDate,
    lastUpdatedFromSessionId: insight.sessionId,
    memoryConfidence: insight.statedConfidence ?? 'medium',
    overview: memory.overview,
  }
}
