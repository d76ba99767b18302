import { z } from 'zod'
import { PipelineError } from './errors'
import { resolveGoogleModel } from './google'

export const DEFAULT_CHUNK_EXTENSIONS = ['.webm', '.aac', '.mp3', '.wav'] as const
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'
export const DEFAULT_OPENAI_TRANSCRIPTION_MODEL = 'whisper-1'
export const OVERVIEW_MIN_CHARS = 50

const PLACEHOLDER_SERVICE_KEY = 'YOUR_SUPABASE_SERVICE_ROLE_KEY'

export type StorageConfig = {
  supabaseUrl: string
  serviceRoleKey: string
  bucket: string
}

export type OracleConfig =
  | { provider: 'google'; apiKey: string; model: string }
  | { provider: 'openai'; apiKey: string; model: string; transcriptionModel: string }

export type PipelineConfig = {
  redis: {
    url: string
    keyPrefix: string
    queueName: string
    jobAttempts: number
    jobKeyTtlSeconds: number
  }
  storage: StorageConfig | null
  oracle: OracleConfig
  overview: {
    minChars: number
    maxChars: number
    historyLimit: number
  }
  chunkExtensions: string[]
}

const blankToUndefined = (value: unknown) => (typeof value === 'string' && !value.trim().length ? undefined : value)

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional())

const envSchema = z
  .object({
    REDIS_URL: z.preprocess(blankToUndefined, z.string().trim().default('redis://127.0.0.1:6379')),
    PIPELINE_KEY_PREFIX: z.preprocess(blankToUndefined, z.string().trim().default('pipeline')),
    PIPELINE_QUEUE_NAME: z.preprocess(blankToUndefined, z.string().trim().default('pipeline:queue')),
    PIPELINE_JOB_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(1)),
    PIPELINE_JOB_KEY_TTL_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(86400)),
    SUPABASE_URL: optionalText,
    SUPABASE_SERVICE_ROLE_KEY: optionalText,
    SUPABASE_STORAGE_BUCKET: optionalText,
    ORACLE_PROVIDER: z.preprocess(blankToUndefined, z.enum(['google', 'openai']).default('google')),
    GOOGLE_API_KEY: optionalText,
    GOOGLE_MODEL: optionalText,
    OPENAI_API_KEY: optionalText,
    OPENAI_MODEL: optionalText,
    OPENAI_TRANSCRIPTION_MODEL: optionalText,
    OVERVIEW_MAX_CHARS: z.preprocess(blankToUndefined, z.coerce.number().int().min(OVERVIEW_MIN_CHARS * 2).default(500)),
    OVERVIEW_HISTORY_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(10)),
    CHUNK_EXTENSIONS: optionalText,
  })
  .superRefine((env, ctx) => {
    const supabaseKeys = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'SUPABASE_STORAGE_BUCKET'] as const
    const present = supabaseKeys.filter((key) => env[key])
    if (present.length && present.length < supabaseKeys.length) {
      for (const key of supabaseKeys) {
        if (!env[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `${key} is required when Supabase storage is configured` })
        }
      }
    }
    if (env.SUPABASE_URL) {
      let protocol = ''
      try {
        protocol = new URL(env.SUPABASE_URL).protocol
      } catch {
        protocol = ''
      }
      if (!protocol.startsWith('http')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'SUPABASE_URL must include http/https' })
      }
    }
    if (env.SUPABASE_SERVICE_ROLE_KEY === PLACEHOLDER_SERVICE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is using a placeholder value',
      })
    }
    const keyName = env.ORACLE_PROVIDER === 'google' ? 'GOOGLE_API_KEY' : 'OPENAI_API_KEY'
    if (!env[keyName]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [keyName], message: `${keyName} is required for the ${env.ORACLE_PROVIDER} oracle` })
    }
  })

type ParsedEnv = z.infer<typeof envSchema>

function parseExtensions(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_CHUNK_EXTENSIONS]
  const extensions = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`))
  return extensions.length ? Array.from(new Set(extensions)) : [...DEFAULT_CHUNK_EXTENSIONS]
}

function oracleFromEnv(env: ParsedEnv): OracleConfig {
  if (env.ORACLE_PROVIDER === 'openai') {
    return {
      provider: 'openai',
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      transcriptionModel: env.OPENAI_TRANSCRIPTION_MODEL ?? DEFAULT_OPENAI_TRANSCRIPTION_MODEL,
    }
  }
  return {
    provider: 'google',
    apiKey: env.GOOGLE_API_KEY ?? '',
    model: resolveGoogleModel(env.GOOGLE_MODEL),
  }
}

function storageFromEnv(env: ParsedEnv): StorageConfig | null {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY || !env.SUPABASE_STORAGE_BUCKET) return null
  return {
    supabaseUrl: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    bucket: env.SUPABASE_STORAGE_BUCKET,
  }
}

/**
 * Build the pipeline configuration once at process start. Every component
 * receives the returned object; nothing else reads the environment.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ name: issue.path.join('.'), message: issue.message }))
    throw new PipelineError('config_invalid', `Invalid pipeline configuration: ${issues.map((issue) => issue.name).join(', ')}`, {
      details: { issues },
    })
  }
  const values = parsed.data
  return {
    redis: {
      url: values.REDIS_URL,
      keyPrefix: values.PIPELINE_KEY_PREFIX,
      queueName: values.PIPELINE_QUEUE_NAME,
      jobAttempts: values.PIPELINE_JOB_ATTEMPTS,
      jobKeyTtlSeconds: values.PIPELINE_JOB_KEY_TTL_SECONDS,
    },
    storage: storageFromEnv(values),
    oracle: oracleFromEnv(values),
    overview: {
      minChars: OVERVIEW_MIN_CHARS,
      maxChars: values.OVERVIEW_MAX_CHARS,
      historyLimit: values.OVERVIEW_HISTORY_LIMIT,
    },
    chunkExtensions: parseExtensions(values.CHUNK_EXTENSIONS),
  }
}

function redactSecret(value: string | undefined) {
  return value ? `${value.length} chars` : null
}

export function describePipelineConfig(config: PipelineConfig) {
  return {
    redisUrl: config.redis.url.replace(/\/\/[^@/]*@/, '//***@'),
    keyPrefix: config.redis.keyPrefix,
    queueName: config.redis.queueName,
    jobAttempts: config.redis.jobAttempts,
    storage: config.storage
      ? {
          supabaseUrl: config.storage.supabaseUrl,
          serviceRoleKey: redactSecret(config.storage.serviceRoleKey),
          bucket: config.storage.bucket,
        }
      : null,
    oracle: { provider: config.oracle.provider, model: config.oracle.model, apiKey: redactSecret(config.oracle.apiKey) },
    overview: config.overview,
    chunkExtensions: config.chunkExtensions,
  }
}
