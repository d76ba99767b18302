export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const
export const ENGAGEMENT_LEVELS = ['high', 'medium', 'low'] as const
export const CONFIDENCE_TRENDS = ['increasing', 'stable', 'decreasing'] as const
export const EMOTIONS = ['happy', 'sad', 'angry', 'neutral'] as const

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number]
export type EngagementLevel = (typeof ENGAGEMENT_LEVELS)[number]
export type ConfidenceTrend = (typeof CONFIDENCE_TRENDS)[number]
export type Emotion = (typeof EMOTIONS)[number]

export type SessionRef = {
  subjectId: string
  sessionId: string
}

export type TranscriptSegment = {
  speaker: string
  timestamp: string
  content: string
  language: string
  emotion: Emotion
  translation: string | null
}

export type ChunkAnalysis = {
  segments: TranscriptSegment[]
  summary: string
}

export type ChunkResult = {
  index: number
  ref: string
  analysis: ChunkAnalysis
  processedAt: string
}

// Layer 1: written once per merge, overwritten wholesale on rerun
export type SessionEvent = SessionRef & {
  timestamp: string
  sourceRefs: string[]
  mergedText: string
  speakerMap: Record<string, string>
}

export type GoalStatus = {
  name: string
  status: string
}

// Layer 2
export type SessionInsight = {
  sessionId: string
  isRelevant: boolean
  extractedEntities: string[]
  subjectIntent: string
  summaryBullets: string[]
  actionItems: string[]
  followUps: string[]
  followUpDate: string | null
  confidence: ConfidenceLevel
  // What the oracle actually said; null when it gave no valid level
  statedConfidence: ConfidenceLevel | null
  profileUpdates: Record<string, string>
  goals: GoalStatus[]
  completedActionItems: string[]
  preferredProducts: string[]
  disfavoredProducts: string[]
  objections: string[]
  riskProfile: string | null
  engagementLevel: EngagementLevel | null
  confidenceTrend: ConfidenceTrend | null
}

// Layer 3: one per subject, evolves across sessions
export type SubjectMemory = {
  subjectId: string
  profile: Record<string, string>
  riskProfile: string | null
  preferredProducts: string[]
  disfavoredProducts: string[]
  activeFinancialGoals: GoalStatus[]
  discussedProducts: Record<string, number>
  objectionsHistory: string[]
  decisionConfidenceTrend: ConfidenceTrend
  engagementLevel: EngagementLevel
  pendingActionItems: string[]
  lastFollowUpDate: string | null
  lastUpdatedFromSessionId: string | null
  memoryConfidence: ConfidenceLevel
  overview: string
}

export type PipelineTaskArgs = {
  dispatch: SessionRef & { totalExpected: number }
  enrichChunk: SessionRef & { ref: string; index: number; totalExpected: number }
  merge: SessionRef & { totalExpected: number }
}

export type SessionStatus = 'queued' | 'processing' | 'complete' | 'failed'
