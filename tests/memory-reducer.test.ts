import { describe, expect, it } from 'vitest'
import { reduceMemory } from '../lib/memory-reducer'
import { defaultMemory, emptyInsight } from '../lib/normalize'
import type { ConfidenceLevel, SessionInsight, SubjectMemory } from '../types/pipeline'

const BULLETS = ['Reviewed savings', 'Discussed SIP', 'Agreed next steps']

function insight(overrides: Partial<SessionInsight> = {}): SessionInsight {
  return { ...emptyInsight('m1'), ...overrides }
}

function stated(level: ConfidenceLevel) {
  return { confidence: level, statedConfidence: level }
}

function memory(overrides: Partial<SubjectMemory> = {}): SubjectMemory {
  return { ...defaultMemory('c1'), ...overrides }
}

describe('reduceMemory', () => {
  it('counts each distinct product once per session', () => {
    const first = reduceMemory(memory(), insight({ extractedEntities: ['SIP', 'ELSS'] }))
    const second = reduceMemory(first, insight({ extractedEntities: ['sip'] }))
    const third = reduceMemory(second, insight({ extractedEntities: ['SIP', 'Sip'] }))

    expect(first.discussedProducts).toEqual({ SIP: 1, ELSS: 1 })
    expect(second.discussedProducts).toEqual({ SIP: 2, ELSS: 1 })
    expect(third.discussedProducts).toEqual({ SIP: 3, ELSS: 1 })
  })

  it('leaves goals and preferences alone when the insight has no bullets', () => {
    const before = memory({
      activeFinancialGoals: [{ name: 'Retirement', status: 'active' }],
      preferredProducts: ['Index funds'],
    })

    const after = reduceMemory(
      before,
      insight({
        summaryBullets: [],
        goals: [{ name: 'House', status: 'planned' }],
        preferredProducts: ['Gold'],
        disfavoredProducts: ['Index funds'],
        extractedEntities: ['Gold'],
      }),
    )

    expect(after.activeFinancialGoals).toEqual([{ name: 'Retirement', status: 'active' }])
    expect(after.preferredProducts).toEqual(['Index funds'])
    expect(after.disfavoredProducts).toEqual([])
    expect(after.discussedProducts).toEqual({ Gold: 1 })
  })

  it('updates goals and moves products between preference lists', () => {
    const before = memory({
      activeFinancialGoals: [{ name: 'Retirement', status: 'active' }],
      preferredProducts: ['Index funds'],
      disfavoredProducts: ['Gold'],
    })

    const after = reduceMemory(
      before,
      insight({
        summaryBullets: BULLETS,
        goals: [
          { name: 'retirement', status: 'on track' },
          { name: 'House', status: 'planned' },
        ],
        preferredProducts: ['Gold'],
        disfavoredProducts: ['Index funds'],
      }),
    )

    expect(after.activeFinancialGoals).toEqual([
      { name: 'Retirement', status: 'on track' },
      { name: 'House', status: 'planned' },
    ])
    expect(after.preferredProducts).toEqual(['Gold'])
    expect(after.disfavoredProducts).toEqual(['Index funds'])
  })

  it('follows an explicit trend hint', () => {
    const after = reduceMemory(memory(), insight({ ...stated('high'), confidenceTrend: 'decreasing' }))

    expect(after.decisionConfidenceTrend).toBe('decreasing')
  })

  it('derives the trend from the confidence change', () => {
    expect(reduceMemory(memory(), insight(stated('high'))).decisionConfidenceTrend).toBe('increasing')
    expect(reduceMemory(memory(), insight(stated('low'))).decisionConfidenceTrend).toBe('decreasing')
    expect(reduceMemory(memory(), insight(stated('medium'))).decisionConfidenceTrend).toBe('stable')
  })

  it('defaults memory confidence to medium and keeps the trend when the insight has no confidence', () => {
    const before = memory({ memoryConfidence: 'high', decisionConfidenceTrend: 'increasing' })

    const after = reduceMemory(before, insight())

    expect(after.memoryConfidence).toBe('medium')
    expect(after.decisionConfidenceTrend).toBe('increasing')
  })

  it('tracks pending action items and drops completed ones', () => {
    const before = memory({ pendingActionItems: ['Send KYC form', 'Book review'] })

    const after = reduceMemory(
      before,
      insight({ actionItems: ['book review', 'Open SIP'], completedActionItems: ['send kyc form'] }),
    )

    expect(after.pendingActionItems).toEqual(['Book review', 'Open SIP'])
  })

  it('takes scalar fields from the insight when present', () => {
    const before = memory({
      profile: { occupation: 'Nurse', city: 'Pune' },
      riskProfile: 'moderate',
      lastFollowUpDate: '2025-01-10',
      objectionsHistory: ['Fees are high'],
      overview: 'Existing overview.',
    })

    const after = reduceMemory(
      before,
      insight({
        profileUpdates: { city: 'Mumbai', children: '2' },
        riskProfile: null,
        followUpDate: '2025-02-01',
        objections: ['fees are high', 'Lock-in period'],
        engagementLevel: 'high',
        ...stated('high'),
      }),
    )

    expect(after.profile).toEqual({ occupation: 'Nurse', city: 'Mumbai', children: '2' })
    expect(after.riskProfile).toBe('moderate')
    expect(after.lastFollowUpDate).toBe('2025-02-01')
    expect(after.objectionsHistory).toEqual(['Fees are high', 'Lock-in period'])
    expect(after.engagementLevel).toBe('high')
    expect(after.memoryConfidence).toBe('high')
    expect(after.lastUpdatedFromSessionId).toBe('m1')
    expect(after.overview).toBe('Existing overview.')
  })

  it('defaults engagement to medium when the insight has none', () => {
    const after = reduceMemory(memory({ engagementLevel: 'high' }), insight({ engagementLevel: null }))

    expect(after.engagementLevel).toBe('medium')
  })

  it('does not mutate its inputs', () => {
    const before = memory({
      activeFinancialGoals: [{ name: 'Retirement', status: 'active' }],
      discussedProducts: { SIP: 1 },
    })
    const snapshot = structuredClone(before)
    const next = insight({ summaryBullets: BULLETS, goals: [{ name: 'Retirement', status: 'done' }], extractedEntities: ['SIP'] })

    reduceMemory(before, next)

    expect(before).toEqual(snapshot)
  })
})
