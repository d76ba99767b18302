// lib/google.ts
import { GoogleGenerativeAI, type GenerationConfig } from '@google/generative-ai'
import { PipelineError } from './errors'

export const DEFAULT_GOOGLE_MODEL = 'gemini-2.5-flash'

// Strip legacy "/models/*" prefixes
const LEGACY_PREFIX = /^\/?models\//i

// Model families that no longer accept audio with JSON output
const LEGACY_MODEL_PATTERNS = [/gemini-1\./i, /gemini-pro/i, /text-bison/i, /chat-bison/i]

function normalizeModelCandidate(candidate: string | null | undefined): string | null {
  if (!candidate || typeof candidate !== 'string') return null

  const trimmed = candidate.trim()
  if (!trimmed) return null

  const withoutPrefix = trimmed.replace(LEGACY_PREFIX, '')
  if (!withoutPrefix) return null

  if (LEGACY_MODEL_PATTERNS.some((pattern) => pattern.test(withoutPrefix.toLowerCase()))) {
    return DEFAULT_GOOGLE_MODEL
  }

  return withoutPrefix
}

/**
 * Resolve the Gemini model name from GOOGLE_MODEL or fall back to the default.
 */
export function resolveGoogleModel(primaryModel: string | null | undefined): string {
  return normalizeModelCandidate(primaryModel) || DEFAULT_GOOGLE_MODEL
}

export function getGoogleModel(apiKey: string, model: string, generationConfig?: GenerationConfig) {
  if (!apiKey) {
    throw new PipelineError('config_invalid', 'GOOGLE_API_KEY must be set for the Google oracle')
  }
  const genAI = new GoogleGenerativeAI(apiKey)
  return genAI.getGenerativeModel({ model, generationConfig })
}
