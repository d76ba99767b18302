/**
 * The commands the pipeline sends to Redis. An ioredis `Redis` instance
 * satisfies this, and tests pass a small fake.
 */
export type RedisCommands = {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  set(key: string, value: string, mode: 'NX'): Promise<string | null>
  set(key: string, value: string, expiry: 'EX', seconds: number): Promise<unknown>
  set(key: string, value: string, expiry: 'EX', seconds: number, mode: 'NX'): Promise<string | null>
  del(key: string): Promise<number>
  incr(key: string): Promise<number>
  sadd(key: string, member: string): Promise<number>
  smembers(key: string): Promise<string[]>
  scard(key: string): Promise<number>
  lpush(key: string, value: string): Promise<number>
  brpop(key: string, timeout: number): Promise<[string, string] | null>
}

/**
 * Shared key/value state the pipeline makes control decisions on. Every
 * method is a single atomic operation; callers never read-modify-write.
 */
export type CoordinationStore = {
  /** Resolves true when the member was not already present. */
  setAdd(key: string, member: string): Promise<boolean>
  setMembers(key: string): Promise<string[]>
  setCount(key: string): Promise<number>
  incr(key: string): Promise<number>
  set(key: string, value: string): Promise<void>
  /** Resolves true when this call created the key. */
  setIfAbsent(key: string, value: string): Promise<boolean>
  get(key: string): Promise<string | null>
  remove(key: string): Promise<void>
}

export type SessionKeys = {
  uploaded: string
  total: string
  dispatched: string
  jobId: string
  processed: string
  result: string
  error: string
  segments: string
}

export function sessionKeys(prefix: string, subjectId: string, sessionId: string): SessionKeys {
  const base = `${prefix}:session:${subjectId}:${sessionId}`
  return {
    uploaded: `${base}:uploaded`,
    total: `${base}:total`,
    dispatched: `${base}:dispatched`,
    jobId: `${base}:job_id`,
    processed: `${base}:processed`,
    result: `${base}:result`,
    error: `${base}:error`,
    segments: `${base}:segments`,
  }
}

// Derived from the session identity only, so every worker that sees the
// counter hit its target submits under the same key.
export function mergeJobId(subjectId: string, sessionId: string) {
  return `merge-${subjectId}-${sessionId}`
}

export class RedisCoordinationStore implements CoordinationStore {
  constructor(private readonly redis: RedisCommands) {}

  async setAdd(key: string, member: string) {
    return (await this.redis.sadd(key, member)) === 1
  }

  async setMembers(key: string) {
    return this.redis.smembers(key)
  }

  async setCount(key: string) {
    return this.redis.scard(key)
  }

  async incr(key: string) {
    return this.redis.incr(key)
  }

  async set(key: string, value: string) {
    await this.redis.set(key, value)
  }

  async setIfAbsent(key: string, value: string) {
    return (await this.redis.set(key, value, 'NX')) === 'OK'
  }

  async get(key: string) {
    return this.redis.get(key)
  }

  async remove(key: string) {
    await this.redis.del(key)
  }
}

export class MemoryCoordinationStore implements CoordinationStore {
  private readonly sets = new Map<string, Set<string>>()
  private readonly values = new Map<string, string>()

  async setAdd(key: string, member: string) {
    let members = this.sets.get(key)
    if (!members) {
      members = new Set()
      this.sets.set(key, members)
    }
    if (members.has(member)) return false
    members.add(member)
    return true
  }

  async setMembers(key: string) {
    return Array.from(this.sets.get(key) ?? [])
  }

  async setCount(key: string) {
    return this.sets.get(key)?.size ?? 0
  }

  async incr(key: string) {
    const current = Number.parseInt(this.values.get(key) ?? '0', 10)
    const next = (Number.isNaN(current) ? 0 : current) + 1
    this.values.set(key, String(next))
    return next
  }

  async set(key: string, value: string) {
    this.values.set(key, value)
  }

  async setIfAbsent(key: string, value: string) {
    if (this.values.has(key)) return false
    this.values.set(key, value)
    return true
  }

  async get(key: string) {
    return this.values.get(key) ?? null
  }

  async remove(key: string) {
    this.values.delete(key)
    this.sets.delete(key)
  }
}
