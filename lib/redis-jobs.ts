import { z } from 'zod'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import type { RedisCommands } from './coordination'
import { PipelineError, describeError, errorMessage } from './errors'
import { newJobId, type EnqueueOptions, type JobScheduler, type TaskHandlers, type TaskMap } from './jobs'

export type TaskSchemas<Tasks extends TaskMap> = {
  [Name in keyof Tasks]: z.ZodType<Tasks[Name]>
}

// The worker loop blocks on its own connection.
export type QueueConnection = RedisCommands & {
  duplicate(): QueueConnection
  disconnect(): void
}

export type RedisJobSchedulerOptions = {
  queueName: string
  maxAttempts: number
  jobKeyTtlSeconds: number
  pollTimeoutSeconds?: number
  log?: DiagnosticLogger
}

const envelopeSchema = z.object({
  jobId: z.string().min(1),
  task: z.string().min(1),
  args: z.unknown(),
  attempt: z.number().int().nonnegative(),
})

type Envelope = z.infer<typeof envelopeSchema>

/**
 * List-backed queue on Redis. Idempotency keys are claimed with SET NX EX so a
 * duplicate submission inside the TTL is dropped before it reaches the list.
 */
export class RedisJobScheduler<Tasks extends TaskMap> implements JobScheduler<Tasks> {
  private readonly log: DiagnosticLogger
  private stopped = false

  constructor(
    private readonly redis: QueueConnection,
    private readonly schemas: TaskSchemas<Tasks>,
    private readonly options: RedisJobSchedulerOptions,
  ) {
    this.log = options.log ?? createDiagnosticLogger('redis-jobs', { queue: options.queueName })
  }

  private jobKey(jobId: string) {
    return `${this.options.queueName}:job:${jobId}`
  }

  async enqueue<Name extends keyof Tasks & string>(task: Name, args: Tasks[Name], options: EnqueueOptions = {}) {
    const jobId = options.idempotencyKey ?? newJobId(task)
    const ttl = this.options.jobKeyTtlSeconds
    if (options.idempotencyKey) {
      const claimed = await this.redis.set(this.jobKey(jobId), 'queued', 'EX', ttl, 'NX')
      if (claimed === null) {
        this.log('log', 'enqueue:duplicate', { jobId, task })
        return { jobId, accepted: false }
      }
    } else {
      await this.redis.set(this.jobKey(jobId), 'queued', 'EX', ttl)
    }
    const envelope: Envelope = { jobId, task, args, attempt: 0 }
    await this.redis.lpush(this.options.queueName, JSON.stringify(envelope))
    this.log('log', 'enqueue:accepted', { jobId, task })
    return { jobId, accepted: true }
  }

  private isTask(handlers: TaskHandlers<Tasks>, task: string): task is keyof Tasks & string {
    return Object.prototype.hasOwnProperty.call(handlers, task)
  }

  private async runTask<Name extends keyof Tasks & string>(handlers: TaskHandlers<Tasks>, task: Name, rawArgs: unknown) {
    const args = this.schemas[task].parse(rawArgs)
    return handlers[task](args)
  }

  private async markJob(jobId: string, status: string, error?: string) {
    const ttl = this.options.jobKeyTtlSeconds
    await this.redis.set(this.jobKey(jobId), status, 'EX', ttl)
    if (error) {
      await this.redis.set(`${this.jobKey(jobId)}:error`, error, 'EX', ttl)
    }
  }

  private async process(handlers: TaskHandlers<Tasks>, envelope: Envelope) {
    const { jobId, task } = envelope
    const attempt = envelope.attempt + 1
    if (!this.isTask(handlers, task)) {
      const error = new PipelineError('unknown_task', `No handler registered for task ${task}`)
      this.log('error', 'job:unknown-task', { jobId, task })
      await this.markJob(jobId, 'failed', error.message)
      return
    }
    await this.markJob(jobId, 'running')
    try {
      await this.runTask(handlers, task, envelope.args)
      await this.markJob(jobId, 'completed')
      this.log('log', 'job:completed', { jobId, task, attempt })
    } catch (error) {
      this.log('error', 'job:attempt-failed', { jobId, task, attempt, error: describeError(error) })
      if (attempt < this.options.maxAttempts) {
        const retry: Envelope = { ...envelope, attempt }
        await this.redis.lpush(this.options.queueName, JSON.stringify(retry))
        await this.markJob(jobId, 'queued')
        return
      }
      await this.markJob(jobId, 'failed', errorMessage(error))
    }
  }

  private parseEnvelope(raw: string): Envelope | null {
    try {
      const parsed = envelopeSchema.safeParse(JSON.parse(raw))
      return parsed.success ? parsed.data : null
    } catch {
      return null
    }
  }

  /**
   * Pull and run jobs until `stop()` is called. Each popped job runs
   * concurrently with the loop so slow oracle calls do not block the queue.
   */
  async work(handlers: TaskHandlers<Tasks>) {
    this.stopped = false
    const blocking = this.redis.duplicate()
    const running = new Set<Promise<void>>()
    const timeout = this.options.pollTimeoutSeconds ?? 5
    this.log('log', 'worker:start', { tasks: Object.keys(handlers) })

    try {
      while (!this.stopped) {
        const popped = await blocking.brpop(this.options.queueName, timeout)
        if (!popped) continue
        const envelope = this.parseEnvelope(popped[1])
        if (!envelope) {
          this.log('error', 'worker:malformed-envelope', { raw: popped[1].slice(0, 200) })
          continue
        }
        const job = this.process(handlers, envelope).catch((error: unknown) => {
          this.log('error', 'worker:job-crashed', { jobId: envelope.jobId, error: describeError(error) })
        })
        running.add(job)
        void job.finally(() => running.delete(job))
      }
    } finally {
      await Promise.all(Array.from(running))
      blocking.disconnect()
      this.log('log', 'worker:stopped')
    }
  }

  stop() {
    this.stopped = true
  }

  async jobStatus(jobId: string) {
    const [status, error] = await Promise.all([
      this.redis.get(this.jobKey(jobId)),
      this.redis.get(`${this.jobKey(jobId)}:error`),
    ])
    return { jobId, status, error }
  }
}
