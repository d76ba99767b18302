import { beforeEach, describe, expect, it } from 'vitest'
import { MemoryBlobStore } from '../lib/blob'
import { MemoryCoordinationStore } from '../lib/coordination'
import { emptyInsight, insightToWire } from '../lib/normalize'
import { SessionRecords } from '../lib/session-records'
import { SessionStatusReader } from '../lib/session-status'
import { silentLogger } from '../utils/diagnostics'
import { TEST_PREFIX, keysFor } from './fixtures'

describe('SessionStatusReader', () => {
  let coordination: MemoryCoordinationStore
  let records: SessionRecords
  let reader: SessionStatusReader
  const keys = keysFor('c1', 'm1')

  beforeEach(() => {
    coordination = new MemoryCoordinationStore()
    records = new SessionRecords(new MemoryBlobStore(), silentLogger)
    reader = new SessionStatusReader(coordination, records, TEST_PREFIX, silentLogger)
  })

  it('reports queued before any work starts', async () => {
    expect(await reader.status('c1', 'm1')).toEqual({ status: 'queued', processed: 0 })
  })

  it('reports processing once a dispatch has reset the counter', async () => {
    await coordination.set(keys.processed, '0')
    await coordination.incr(keys.processed)

    expect(await reader.status('c1', 'm1')).toEqual({ status: 'processing', processed: 1 })
  })

  it('reports the published failure', async () => {
    await coordination.set(keys.processed, '2')
    await coordination.set(keys.error, 'Merge failed for c1/m1: boom')

    expect(await reader.status('c1', 'm1')).toEqual({ status: 'failed', processed: 2, error: 'Merge failed for c1/m1: boom' })
  })

  it('returns the result with the merged transcript', async () => {
    const insight = { ...emptyInsight('m1'), subjectIntent: 'Open an account', confidence: 'medium' as const }
    await coordination.set(keys.processed, '2')
    await coordination.set(keys.result, JSON.stringify(insightToWire(insight)))
    await records.saveEvent({
      subjectId: 'c1',
      sessionId: 'm1',
      timestamp: '2025-01-01T00:00:00.000Z',
      sourceRefs: [],
      mergedText: '[00:00] Advisor: Welcome back',
      speakerMap: { Advisor: 'unassigned' },
    })

    expect(await reader.status('c1', 'm1')).toEqual({
      status: 'complete',
      processed: 2,
      result: insight,
      transcript: '[00:00] Advisor: Welcome back',
    })
  })

  it('creates the default memory for an unknown subject', async () => {
    const memory = await reader.memory('c9')

    expect(memory.subjectId).toBe('c9')
    expect(memory.overview).toBe('')
  })
})
