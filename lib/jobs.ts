import { randomUUID } from 'node:crypto'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import { PipelineError, describeError, errorMessage } from './errors'

export type TaskMap = Record<string, object>

export type TaskHandlers<Tasks extends TaskMap> = {
  [Name in keyof Tasks]: (args: Tasks[Name]) => Promise<unknown>
}

export type EnqueueOptions = {
  /** Submissions sharing a key collapse into one job. */
  idempotencyKey?: string
}

export type EnqueueReceipt = {
  jobId: string
  accepted: boolean
}

export type JobScheduler<Tasks extends TaskMap> = {
  enqueue<Name extends keyof Tasks & string>(task: Name, args: Tasks[Name], options?: EnqueueOptions): Promise<EnqueueReceipt>
}

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed'

export type JobRecord = {
  jobId: string
  task: string
  status: JobStatus
  attempts: number
  enqueuedAt: string
  finishedAt?: string
  error?: string
}

export function newJobId(task: string) {
  return `${task}-${randomUUID()}`
}

export type LocalJobSchedulerOptions = {
  maxAttempts?: number
  log?: DiagnosticLogger
}

/**
 * In-process scheduler. Jobs start on the next tick and run concurrently with
 * no ordering between them; `drain()` waits until nothing is in flight,
 * including jobs enqueued by other jobs.
 */
export class LocalJobScheduler<Tasks extends TaskMap> implements JobScheduler<Tasks> {
  private handlers: TaskHandlers<Tasks> | null = null
  private readonly jobs = new Map<string, JobRecord>()
  private readonly inflight = new Set<Promise<void>>()
  private readonly maxAttempts: number
  private readonly log: DiagnosticLogger

  constructor(options: LocalJobSchedulerOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 1)
    this.log = options.log ?? createDiagnosticLogger('local-jobs')
  }

  register(handlers: TaskHandlers<Tasks>) {
    this.handlers = handlers
  }

  async enqueue<Name extends keyof Tasks & string>(task: Name, args: Tasks[Name], options: EnqueueOptions = {}) {
    const jobId = options.idempotencyKey ?? newJobId(task)
    if (this.jobs.has(jobId)) {
      this.log('log', 'enqueue:duplicate', { jobId, task })
      return { jobId, accepted: false }
    }
    const record: JobRecord = { jobId, task, status: 'queued', attempts: 0, enqueuedAt: new Date().toISOString() }
    this.jobs.set(jobId, record)
    this.log('log', 'enqueue:accepted', { jobId, task })

    const run = Promise.resolve().then(() => this.execute(record, task, args))
    this.inflight.add(run)
    void run.finally(() => this.inflight.delete(run))
    return { jobId, accepted: true }
  }

  private async execute<Name extends keyof Tasks & string>(record: JobRecord, task: Name, args: Tasks[Name]) {
    const handlers = this.handlers
    if (!handlers) {
      record.status = 'failed'
      record.error = new PipelineError('unknown_task', `No handlers registered for ${task}`).message
      this.log('error', 'job:unregistered', { jobId: record.jobId, task })
      return
    }
    while (record.attempts < this.maxAttempts) {
      record.attempts += 1
      record.status = 'running'
      try {
        await handlers[task](args)
        record.status = 'completed'
        record.finishedAt = new Date().toISOString()
        this.log('log', 'job:completed', { jobId: record.jobId, task, attempts: record.attempts })
        return
      } catch (error) {
        record.error = errorMessage(error)
        this.log('error', 'job:attempt-failed', { jobId: record.jobId, task, attempt: record.attempts, error: describeError(error) })
      }
    }
    record.status = 'failed'
    record.finishedAt = new Date().toISOString()
  }

  async drain() {
    while (this.inflight.size) {
      await Promise.all(Array.from(this.inflight))
    }
  }

  getJob(jobId: string) {
    const record = this.jobs.get(jobId)
    return record ? { ...record } : undefined
  }

  listJobs(task?: keyof Tasks & string) {
    return Array.from(this.jobs.values())
      .filter((record) => !task || record.task === task)
      .map((record) => ({ ...record }))
  }
}
