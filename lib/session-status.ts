import type { SessionInsight, SessionStatus, SubjectMemory } from '@/types/pipeline'
import { createDiagnosticLogger, type DiagnosticLogger } from '@/utils/diagnostics'
import { sessionKeys, type CoordinationStore } from './coordination'
import { normalizeInsight } from './normalize'
import type { SessionRecords } from './session-records'

export type SessionStatusReport = {
  status: SessionStatus
  processed: number
  result?: SessionInsight
  transcript?: string
  error?: string
}

export type UploadAck = {
  receivedCount: number
  status: 'complete' | 'incomplete'
  jobId: string | null
}

/** Read side for pollers: what state a session is in and what it produced. */
export class SessionStatusReader {
  private readonly log: DiagnosticLogger

  constructor(
    private readonly coordination: CoordinationStore,
    private readonly records: SessionRecords,
    private readonly keyPrefix: string,
    log?: DiagnosticLogger,
  ) {
    this.log = log ?? createDiagnosticLogger('session-status')
  }

  // Published results use the stored insight shape.
  private parseResult(raw: string, sessionId: string): SessionInsight | null {
    try {
      return normalizeInsight(JSON.parse(raw), sessionId)
    } catch {
      return null
    }
  }

  async status(subjectId: string, sessionId: string): Promise<SessionStatusReport> {
    const keys = sessionKeys(this.keyPrefix, subjectId, sessionId)
    const [result, error, processedRaw] = await Promise.all([
      this.coordination.get(keys.result),
      this.coordination.get(keys.error),
      this.coordination.get(keys.processed),
    ])
    const processed = Number.parseInt(processedRaw ?? '0', 10) || 0

    if (result) {
      const insight = this.parseResult(result, sessionId)
      if (insight) {
        const event = await this.records.loadEvent(subjectId, sessionId)
        return { status: 'complete', processed, result: insight, transcript: event?.mergedText ?? '' }
      }
      this.log('error', 'status:invalid-result', { subjectId, sessionId })
    }
    if (error) return { status: 'failed', processed, error }
    if (processedRaw !== null) return { status: 'processing', processed }
    return { status: 'queued', processed }
  }

  async ack(subjectId: string, sessionId: string, totalExpected: number): Promise<UploadAck> {
    const keys = sessionKeys(this.keyPrefix, subjectId, sessionId)
    const [receivedCount, jobId] = await Promise.all([
      this.coordination.setCount(keys.uploaded),
      this.coordination.get(keys.jobId),
    ])
    return { receivedCount, status: receivedCount >= totalExpected ? 'complete' : 'incomplete', jobId }
  }

  async memory(subjectId: string): Promise<SubjectMemory> {
    return this.records.loadMemory(subjectId)
  }
}
