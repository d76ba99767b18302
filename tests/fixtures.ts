import { vi } from 'vitest'
import { MemoryBlobStore } from '../lib/blob'
import { MemoryCoordinationStore, sessionKeys } from '../lib/coordination'
import type { EnrichmentBackend } from '../lib/enrichment-oracle'
import { LocalJobScheduler } from '../lib/jobs'
import { createPipeline, type PipelineSettings } from '../lib/pipeline'
import type { QueueConnection } from '../lib/redis-jobs'
import type { PipelineTaskArgs, TranscriptSegment } from '../types/pipeline'
import { silentLogger } from '../utils/diagnostics'

export const TEST_PREFIX = 'test'

export const TEST_SETTINGS: PipelineSettings = {
  keyPrefix: TEST_PREFIX,
  chunkExtensions: ['.webm', '.aac', '.mp3', '.wav'],
  overview: { minChars: 50, maxChars: 500, historyLimit: 10 },
}

export function segment(speaker: string, timestamp: string, content: string): TranscriptSegment {
  return { speaker, timestamp, content, language: 'en', emotion: 'neutral', translation: null }
}

export function keysFor(subjectId: string, sessionId: string) {
  return sessionKeys(TEST_PREFIX, subjectId, sessionId)
}

export function createHarness(backend: EnrichmentBackend) {
  const store = new MemoryBlobStore()
  const coordination = new MemoryCoordinationStore()
  const scheduler = new LocalJobScheduler<PipelineTaskArgs>({ log: silentLogger })
  const pipeline = createPipeline({ store, coordination, scheduler, backend, settings: TEST_SETTINGS, log: silentLogger })
  scheduler.register(pipeline.handlers)
  return { store, coordination, scheduler, pipeline }
}

/**
 * Redis stand-in over plain maps. An empty BRPOP waits one tick for running
 * jobs to push retries, then calls `onIdle` and returns null.
 */
export function fakeRedis(options: { onIdle?: () => void } = {}) {
  const values = new Map<string, string>()
  const lists = new Map<string, string[]>()
  const sets = new Map<string, Set<string>>()

  const set = vi.fn(async (key: string, value: string, ...args: Array<string | number>): Promise<'OK' | null> => {
    if (args.includes('NX') && values.has(key)) return null
    values.set(key, value)
    return 'OK'
  })
  const lpush = vi.fn(async (key: string, value: string) => {
    const list = lists.get(key) ?? []
    list.unshift(value)
    lists.set(key, list)
    return list.length
  })
  const brpop = vi.fn(async (key: string, _timeout: number): Promise<[string, string] | null> => {
    let item = lists.get(key)?.pop()
    if (item === undefined) {
      await new Promise((resolve) => setTimeout(resolve, 0))
      item = lists.get(key)?.pop()
    }
    if (item === undefined) {
      options.onIdle?.()
      return null
    }
    return [key, item]
  })
  const disconnect = vi.fn()

  const client: QueueConnection = {
    get: async (key: string) => values.get(key) ?? null,
    set,
    del: async (key: string) => {
      const removed = values.delete(key) || sets.delete(key) || lists.delete(key)
      return removed ? 1 : 0
    },
    incr: async (key: string) => {
      const next = Number.parseInt(values.get(key) ?? '0', 10) + 1
      values.set(key, String(next))
      return next
    },
    sadd: async (key: string, member: string) => {
      const members = sets.get(key) ?? new Set<string>()
      sets.set(key, members)
      if (members.has(member)) return 0
      members.add(member)
      return 1
    },
    smembers: async (key: string) => Array.from(sets.get(key) ?? []),
    scard: async (key: string) => sets.get(key)?.size ?? 0,
    lpush,
    brpop,
    duplicate: () => client,
    disconnect,
  }

  return { client, values, lists, set, lpush, disconnect }
}
