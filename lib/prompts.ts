import type { SessionInsight, SubjectMemory } from '@/types/pipeline'

export const CHUNK_TRANSCRIPTION_PROMPT = `Process the audio and produce a detailed transcription.
Requirements:
1. Identify distinct speakers (Speaker 1, Speaker 2, or names when the context makes them clear).
2. Give a timestamp for each segment (MM:SS or HH:MM:SS).
3. Detect the primary language of each segment.
4. Transcribe in Latin characters. For non-English speech also give an English translation.
5. Pick exactly one emotion per segment from: happy, sad, angry, neutral.
6. Give a short summary of the whole audio.
Respond with JSON only:
{"summary":"...","segments":[{"speaker":"...","timestamp":"...","content":"...","language":"...","emotion":"neutral","translation":"..."}]}`

export function buildSessionAnalysisPrompt(mergedText: string, sessionId: string) {
  return `You analyze advisory conversations. Extract structured insights from the transcript below.
Your output must be one JSON object with exactly these keys:
{
  "session_id": "${sessionId}",
  "is_relevant": boolean (true when the conversation is about the subject's finances),
  "extracted_entities": [financial products or instruments named],
  "subject_intent": string (what the subject wants),
  "summary_bullets": [3 to 5 distinct key points, or an empty list],
  "action_items": [specific tasks],
  "completed_action_items": [tasks the conversation confirms are done],
  "follow_ups": [follow-up topics],
  "follow_up_date": "YYYY-MM-DD" or null,
  "confidence": "high" | "medium" | "low",
  "profile_updates": {personal or professional details as key/value strings},
  "goals": [{"name": string, "status": string}] only for goals the subject explicitly confirms,
  "preferred_products": [products the subject favours],
  "disfavored_products": [products the subject rejects],
  "objections": [concerns or objections raised],
  "risk_profile": string or null,
  "engagement_level": "high" | "medium" | "low",
  "confidence_trend": "increasing" | "stable" | "decreasing"
}

Transcript:
${mergedText}

Return ONLY valid JSON.`
}

export function buildOverviewPrompt(memory: SubjectMemory, insight: SessionInsight, history: string, maxChars: number) {
  return `You write the overview an advisor reads in five seconds to recall who a client is.
Rules:
- Two or three complete sentences, third person, professional tone, at most ${maxChars} characters.
- Sentence 1: who they are. Sentence 2: financial behaviour and products. Sentence 3: goals and trajectory.
- Prefer patterns over one-off events.
- Output only the narrative text, no JSON, quotes or formatting. Never stop mid-sentence.

CURRENT MEMORY:
${JSON.stringify(memory)}

MOST RECENT SESSION:
${JSON.stringify(insight)}

HISTORICAL PATTERNS:
${history}`
}
