import { z } from 'zod'
import { chunkBlobKey, extensionForMime, extensionOf, mimeForExtension } from '@/db/layout'
import type { PipelineTaskArgs } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { DurableStore } from './blob'
import { mergeJobId, sessionKeys, type CoordinationStore } from './coordination'
import { PipelineError, describeError } from './errors'
import type { JobScheduler } from './jobs'

const DEFAULT_EXTENSION = '.webm'

const uploadSchema = z.object({
  subjectId: z.string().trim().min(1, 'subjectId is required'),
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  index: z.number().int('index must be an integer').nonnegative('index must not be negative'),
  totalExpected: z.number().int('totalExpected must be an integer').positive('totalExpected must be positive'),
  blob: z.instanceof(Uint8Array).refine((bytes) => bytes.byteLength > 0, 'chunk body is empty'),
  mimeType: z.string().trim().optional(),
  filename: z.string().trim().optional(),
})

export type ChunkUpload = z.input<typeof uploadSchema>

export type ChunkReceipt = {
  accepted: boolean
  triggeredDispatch: boolean
  receivedCount: number
  jobId: string | null
}

export type ChunkIntakeOptions = {
  keyPrefix: string
  extensions: string[]
  log?: DiagnosticLogger
}

/**
 * Receives chunks in any order and fires the dispatch job exactly once, when
 * the set of received indices first covers the whole session.
 */
export class ChunkIntake {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly store: DurableStore,
    private readonly coordination: CoordinationStore,
    private readonly scheduler: JobScheduler<PipelineTaskArgs>,
    private readonly options: ChunkIntakeOptions,
  ) {
    this.log = options.log ?? createDiagnosticLogger('chunk-intake')
  }

  private pickExtension(filename: string | undefined, mimeType: string | undefined) {
    const fromName = filename ? extensionOf(filename) : null
    if (fromName && this.options.extensions.includes(fromName)) return fromName
    const fromMime = extensionForMime(mimeType)
    if (fromMime && this.options.extensions.includes(fromMime)) return fromMime
    return this.options.extensions[0] ?? DEFAULT_EXTENSION
  }

  async receive(upload: ChunkUpload): Promise<ChunkReceipt> {
    const parsed = uploadSchema.safeParse(upload)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message)
      throw new PipelineError('invalid_upload', `Invalid chunk upload: ${issues.join('; ')}`, { details: { issues } })
    }
    const { subjectId, sessionId, index, totalExpected, blob, mimeType, filename } = parsed.data
    if (index >= totalExpected) {
      throw new PipelineError('chunk_out_of_range', `Chunk index ${index} is outside 0..${totalExpected - 1}`, {
        details: { subjectId, sessionId, index, totalExpected },
      })
    }

    const extension = this.pickExtension(filename, mimeType)
    const key = chunkBlobKey(subjectId, sessionId, index, extension)
    await this.store.put(key, Buffer.from(blob), mimeType || mimeForExtension(extension))
    this.log('log', 'chunk:stored', { subjectId, sessionId, index, key })

    const keys = sessionKeys(this.options.keyPrefix, subjectId, sessionId)
    const recorded = await this.coordination.setIfAbsent(keys.total, String(totalExpected))
    if (!recorded) {
      const existing = await this.coordination.get(keys.total)
      if (existing !== String(totalExpected)) {
        this.log('error', 'chunk:total-mismatch', { subjectId, sessionId, index, recorded: existing, received: totalExpected })
      }
    }

    const added = await this.coordination.setAdd(keys.uploaded, String(index))
    const receivedCount = await this.coordination.setCount(keys.uploaded)
    if (!added) {
      this.log('log', 'chunk:duplicate', { subjectId, sessionId, index, receivedCount })
    }

    if (receivedCount !== totalExpected) {
      return { accepted: true, triggeredDispatch: false, receivedCount, jobId: null }
    }

    const claimed = await this.coordination.setIfAbsent(keys.dispatched, new Date().toISOString())
    const jobId = mergeJobId(subjectId, sessionId)
    if (!claimed) {
      return { accepted: true, triggeredDispatch: false, receivedCount, jobId }
    }

    try {
      await this.coordination.set(keys.jobId, jobId)
      const receipt = await this.scheduler.enqueue('dispatch', { subjectId, sessionId, totalExpected })
      this.log('log', 'dispatch:enqueued', { subjectId, sessionId, totalExpected, dispatchJob: receipt.jobId, jobId })
    } catch (error) {
      // Release the fence so a redelivered chunk can dispatch again.
      this.log('error', 'dispatch:enqueue-failed', { subjectId, sessionId, error: describeError(error) })
      await this.coordination.remove(keys.dispatched)
      throw error
    }
    return { accepted: true, triggeredDispatch: true, receivedCount, jobId }
  }
}
