export type PipelineErrorCode =
  | 'config_invalid'
  | 'chunk_out_of_range'
  | 'invalid_upload'
  | 'storage_failed'
  | 'oracle_failed'
  | 'merge_failed'
  | 'unknown_task'

export class PipelineError extends Error {
  readonly code: PipelineErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'PipelineError'
    this.code = code
    this.details = options.details
  }
}

export function errorMessage(err: unknown, fallback = 'Unknown error') {
  if (err instanceof Error) return err.message || fallback
  if (typeof err === 'string' && err.length) return err
  return fallback
}

export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof PipelineError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      details: err.details ?? null,
      cause: err.cause === undefined ? null : describeError(err.cause),
    }
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack }
  }
  if (err && typeof err === 'object') {
    try {
      return { value: JSON.parse(JSON.stringify(err)) }
    } catch {
      return { message: String(err) }
    }
  }
  return { message: String(err) }
}
