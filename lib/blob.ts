import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import { PipelineError } from './errors'

/**
 * Key → blob persistence with overwrite semantics. No transactions across
 * keys are assumed.
 */
export type DurableStore = {
  get(key: string): Promise<Buffer | null>
  put(key: string, body: Buffer, contentType: string): Promise<void>
  exists(key: string): Promise<boolean>
  /** Names of the immediate children of a directory, files and folders alike. */
  list(directory: string): Promise<string[]>
}

export type StorageErrorLike = { message: string; status?: number; statusCode?: string }

export type StorageResult<T> = { data: T | null; error: StorageErrorLike | null }

export type StorageBucketApi = {
  upload(path: string, body: Buffer, options: { contentType: string; upsert: boolean }): Promise<StorageResult<unknown>>
  download(path: string): Promise<StorageResult<Blob>>
  list(path: string, options: { limit: number; search?: string }): Promise<StorageResult<{ name: string }[]>>
  remove(paths: string[]): Promise<StorageResult<unknown>>
}

/** The storage calls made on a Supabase client; `SupabaseClient` satisfies it. */
export type StorageClient = {
  storage: {
    getBucket(id: string): Promise<StorageResult<unknown>>
    createBucket(id: string, options: { public: boolean }): Promise<StorageResult<unknown>>
    from(id: string): StorageBucketApi
  }
}

type RecoveryAction = 'none' | 'retry-conflict' | 'retry-transient' | 'retry-bucket-creation'

const MAX_ATTEMPTS = 3

export function normalizePath(path: string): string {
  return path.trim().replace(/^\/+/, '').replace(/\/+$/, '')
}

function splitPath(path: string) {
  const normalized = normalizePath(path)
  const lastSlash = normalized.lastIndexOf('/')
  return {
    directory: lastSlash >= 0 ? normalized.slice(0, lastSlash) : '',
    name: lastSlash >= 0 ? normalized.slice(lastSlash + 1) : normalized,
  }
}

function errorStatus(error: unknown): number | null {
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') return error.status
    if ('statusCode' in error && typeof error.statusCode === 'string') {
      const parsed = Number.parseInt(error.statusCode, 10)
      return Number.isNaN(parsed) ? null : parsed
    }
  }
  return null
}

function errorCode(error: unknown): string | null {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') return error.code
  return null
}

function isMissingObject(error: StorageErrorLike) {
  return errorStatus(error) === 404 || /not.?found/i.test(error.message)
}

async function delay(ms: number) {
  await new Promise((resolve) => setTimeout(resolve, ms))
}

export type SupabaseBlobStoreOptions = {
  log?: DiagnosticLogger
  backoffBaseMs?: number
}

export class SupabaseBlobStore implements DurableStore {
  private bucketVerified = false
  private readonly log: DiagnosticLogger
  private readonly backoffBaseMs: number

  constructor(
    private readonly client: StorageClient,
    private readonly bucket: string,
    options: SupabaseBlobStoreOptions = {},
  ) {
    this.log = options.log ?? createDiagnosticLogger('supabase-store', { bucket })
    this.backoffBaseMs = options.backoffBaseMs ?? 250
  }

  private async ensureBucketExists(forceRefresh = false) {
    if (this.bucketVerified && !forceRefresh) return

    this.log('log', 'bucket:verify-start', { forceRefresh })
    const { data, error: getError } = await this.client.storage.getBucket(this.bucket)
    if (!getError && data) {
      this.bucketVerified = true
      this.log('log', 'bucket:exists')
      return
    }

    const getStatus = errorStatus(getError)
    if (getError && getStatus !== 404 && getStatus !== 400) {
      this.log('error', 'bucket:verify-failure', { error: getError.message, status: getStatus })
      throw new PipelineError('storage_failed', `Failed to verify Supabase bucket ${this.bucket}: ${getError.message}`)
    }

    this.log('log', 'bucket:create-start')
    const { error: createError } = await this.client.storage.createBucket(this.bucket, { public: false })
    if (createError && errorStatus(createError) !== 409) {
      this.log('error', 'bucket:create-failure', { error: createError.message, status: errorStatus(createError) })
      throw new PipelineError('storage_failed', `Failed to create Supabase bucket ${this.bucket}: ${createError.message}`)
    }
    this.bucketVerified = true
    this.log('log', 'bucket:create-success')
  }

  private async executeWithRecovery<T>(
    operation: string,
    pathname: string,
    fn: () => Promise<StorageResult<T>>,
    options: { missingIsEmpty?: boolean } = {},
  ): Promise<{ data: T | null; missing: boolean }> {
    await this.ensureBucketExists()

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      let recovery: RecoveryAction = 'none'
      const attemptMeta = { attempt, maxAttempts: MAX_ATTEMPTS, pathname, operation }
      const { data, error } = await fn()
      if (!error) {
        this.log('log', 'operation:success', attemptMeta)
        return { data, missing: false }
      }

      if (options.missingIsEmpty && isMissingObject(error)) {
        this.log('log', 'operation:missing', attemptMeta)
        return { data: null, missing: true }
      }

      const status = errorStatus(error)
      const message = error.message || ''
      const isConflict = status === 409 || errorCode(error) === 'duplicate' || /duplicate/i.test(message)
      const isTransient = status === 0 || (status !== null && status >= 500)

      if (status === 404) {
        recovery = 'retry-bucket-creation'
        this.log('error', 'operation:bucket-missing', { ...attemptMeta, status, error: message })
        await this.ensureBucketExists(true)
      } else if (isConflict) {
        recovery = 'retry-conflict'
        this.log('error', 'operation:conflict', { ...attemptMeta, status, error: message })
        const { error: removeError } = await this.client.storage.from(this.bucket).remove([pathname])
        if (removeError) {
          this.log('error', 'operation:conflict-removal-failed', { ...attemptMeta, error: removeError.message })
        }
      } else if (isTransient) {
        recovery = 'retry-transient'
        this.log('error', 'operation:transient', { ...attemptMeta, status, error: message })
      } else {
        this.log('error', 'operation:unrecoverable', { ...attemptMeta, status, error: message })
        throw new PipelineError('storage_failed', `Supabase ${operation} failed for ${pathname}: ${message}`, {
          details: { status, pathname, operation },
        })
      }

      if (attempt === MAX_ATTEMPTS) {
        throw new PipelineError(
          'storage_failed',
          `Supabase ${operation} failed after ${MAX_ATTEMPTS} attempts for ${pathname}: ${message}`,
          { details: { status, pathname, operation, recovery } },
        )
      }

      const backoffMs = Math.pow(2, attempt) * this.backoffBaseMs
      this.log('log', 'operation:backoff', { ...attemptMeta, backoffMs, recovery })
      await delay(backoffMs)
    }

    throw new PipelineError('storage_failed', `Supabase ${operation} failed for ${pathname}`)
  }

  async put(key: string, body: Buffer, contentType: string) {
    const pathname = normalizePath(key)
    this.log('log', 'put:start', { pathname, size: body.byteLength, contentType })
    await this.executeWithRecovery('upload', pathname, () =>
      this.client.storage.from(this.bucket).upload(pathname, body, {
        contentType: contentType || 'application/octet-stream',
        upsert: true,
      }),
    )
  }

  async get(key: string) {
    const pathname = normalizePath(key)
    const { data } = await this.executeWithRecovery(
      'download',
      pathname,
      () => this.client.storage.from(this.bucket).download(pathname),
      { missingIsEmpty: true },
    )
    if (!data) return null
    return Buffer.from(await data.arrayBuffer())
  }

  async exists(key: string) {
    const { directory, name } = splitPath(key)
    const { data } = await this.executeWithRecovery(
      'exists',
      normalizePath(key),
      () => this.client.storage.from(this.bucket).list(directory, { limit: 100, search: name }),
      { missingIsEmpty: true },
    )
    return (data ?? []).some((entry) => entry.name === name)
  }

  async list(directory: string) {
    const normalized = normalizePath(directory)
    const { data } = await this.executeWithRecovery(
      'list',
      normalized,
      () => this.client.storage.from(this.bucket).list(normalized, { limit: 1000 }),
      { missingIsEmpty: true },
    )
    return (data ?? []).map((entry) => entry.name).filter((name) => name && name !== '.emptyFolderPlaceholder')
  }
}

export class MemoryBlobStore implements DurableStore {
  private readonly blobs = new Map<string, { body: Buffer; contentType: string }>()

  async get(key: string) {
    const entry = this.blobs.get(normalizePath(key))
    return entry ? Buffer.from(entry.body) : null
  }

  async put(key: string, body: Buffer, contentType: string) {
    this.blobs.set(normalizePath(key), { body: Buffer.from(body), contentType })
  }

  async exists(key: string) {
    return this.blobs.has(normalizePath(key))
  }

  async list(directory: string) {
    const prefix = `${normalizePath(directory)}/`
    const children = new Set<string>()
    for (const key of this.blobs.keys()) {
      if (!key.startsWith(prefix)) continue
      const rest = key.slice(prefix.length)
      const child = rest.split('/')[0]
      if (child) children.add(child)
    }
    return Array.from(children).sort()
  }

  contentTypeOf(key: string) {
    return this.blobs.get(normalizePath(key))?.contentType ?? null
  }

  keys() {
    return Array.from(this.blobs.keys()).sort()
  }
}
