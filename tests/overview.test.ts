import { describe, expect, it, vi } from 'vitest'
import { MemoryBlobStore } from '../lib/blob'
import { EnrichmentOracle, type OverviewContext } from '../lib/enrichment-oracle'
import { defaultMemory, emptyInsight } from '../lib/normalize'
import { OverviewNarrator, fallbackOverview, finalizeOverview, summarizeHistoricalInsights } from '../lib/overview'
import { SessionRecords } from '../lib/session-records'
import { silentLogger } from '../utils/diagnostics'

const LIMITS = { minChars: 50, maxChars: 500 }
const SENTENCE = 'Mid-career engineer saving steadily for a first home purchase.'

describe('finalizeOverview', () => {
  it('strips wrapping quotes and backticks', () => {
    expect(finalizeOverview(`"${SENTENCE}"`, LIMITS)).toBe(SENTENCE)
    expect(finalizeOverview(`\`${SENTENCE}\``, LIMITS)).toBe(SENTENCE)
  })

  it('rejects output shorter than the minimum', () => {
    expect(finalizeOverview('Short note.', LIMITS)).toBeNull()
  })

  it('cuts a trailing fragment back to the last full sentence', () => {
    expect(finalizeOverview(`${SENTENCE} Prefers index funds and`, LIMITS)).toBe(SENTENCE)
  })

  it('keeps a fragment when cutting would leave too little', () => {
    const text = 'Hi. This subject keeps talking about many products without ever finishing'

    expect(finalizeOverview(text, LIMITS)).toBe(text)
  })

  it('truncates long output at a sentence boundary past sixty percent of the cap', () => {
    const first = `${'a'.repeat(69)}.`
    const second = `${'b'.repeat(59)}.`

    expect(finalizeOverview(`${first} ${second}`, { minChars: 50, maxChars: 100 })).toBe(first)
  })

  it('ellipsizes long output without a late sentence boundary', () => {
    const first = `${'a'.repeat(39)}.`
    const second = `${'b'.repeat(99)}.`

    const result = finalizeOverview(`${first} ${second}`, { minChars: 50, maxChars: 100 })

    expect(result).toBe(`${first} ${'b'.repeat(56)}...`)
    expect(result).toHaveLength(100)
  })
})

describe('summarizeHistoricalInsights', () => {
  it('describes an empty history', () => {
    expect(summarizeHistoricalInsights([])).toBe('No prior sessions available.')
  })

  it('lists counts, top products and recent intents', () => {
    const history = [
      { ...emptyInsight('m2'), extractedEntities: ['SIP', 'ELSS'], subjectIntent: 'Save tax' },
      { ...emptyInsight('m1'), extractedEntities: ['SIP'], subjectIntent: 'Plan retirement' },
    ]

    expect(summarizeHistoricalInsights(history)).toBe(
      'Total sessions analyzed: 2\nMost discussed products: SIP (2x), ELSS (1x)\nRecent intents: Save tax; Plan retirement',
    )
  })
})

describe('fallbackOverview', () => {
  it('assembles profile, goals, products and risk', () => {
    const memory = {
      ...defaultMemory('c1'),
      profile: { occupation: 'Nurse', city: 'Pune', age: '41' },
      activeFinancialGoals: [{ name: 'Retirement', status: 'active' }],
      discussedProducts: { SIP: 3, ELSS: 1, Gold: 2 },
      riskProfile: 'moderate',
    }

    expect(fallbackOverview(memory)).toBe(
      'occupation: Nurse, city: Pune. Goals: Retirement. Interested in: SIP, Gold. Risk profile: moderate',
    )
  })

  it('names the client when memory is empty', () => {
    expect(fallbackOverview(defaultMemory('c1'))).toBe('Client c1')
  })
})

describe('OverviewNarrator', () => {
  function setup(narrateOverview: (context: OverviewContext) => Promise<string>) {
    const records = new SessionRecords(new MemoryBlobStore(), silentLogger)
    const oracle = new EnrichmentOracle(
      { name: 'fake', transcribeChunk: vi.fn(async () => ({})), analyzeSession: vi.fn(async () => ({})), narrateOverview },
      silentLogger,
    )
    const narrator = new OverviewNarrator(records, oracle, { ...LIMITS, historyLimit: 10 }, silentLogger)
    return { records, narrator }
  }

  it('passes the summarized history to the oracle', async () => {
    const narrate = vi.fn(async (_context: OverviewContext) => SENTENCE)
    const { records, narrator } = setup(narrate)
    const latest = { ...emptyInsight('m1'), extractedEntities: ['SIP'], subjectIntent: 'Start investing' }
    await records.saveInsight('c1', latest)

    const overview = await narrator.refresh(defaultMemory('c1'), latest)

    expect(overview).toBe(SENTENCE)
    expect(narrate).toHaveBeenCalledWith(
      expect.objectContaining({
        history: 'Total sessions analyzed: 1\nMost discussed products: SIP (1x)\nRecent intents: Start investing',
        maxChars: 500,
      }),
    )
  })

  it('keeps the previous overview when the oracle fails', async () => {
    const { narrator } = setup(vi.fn(async () => Promise.reject(new Error('model down'))))
    const memory = { ...defaultMemory('c1'), overview: 'Previous overview text.' }

    expect(await narrator.refresh(memory, emptyInsight('m1'))).toBe('Previous overview text.')
  })

  it('falls back to memory when output is too short and nothing came before', async () => {
    const { narrator } = setup(vi.fn(async () => 'Too short.'))

    expect(await narrator.refresh(defaultMemory('c1'), emptyInsight('m1'))).toBe('Client c1')
  })
})
