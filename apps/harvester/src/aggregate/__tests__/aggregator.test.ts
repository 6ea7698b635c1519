import { describe, expect, it } from 'vitest'
import { aggregate } from '../aggregator.js'
import { NoActivePlatformsError } from '../../errors.js'

const NOW = new Date('2026-05-01T14:30:00.000Z')

describe('aggregate', () => {
  it('combines active platforms into one daily record', () => {
    const record = aggregate(
      {
        stubhub: { floor: 900, median: 1000, sampleCount: 40, provenance: 'direct' },
        seatgeek: { floor: 950, median: 1200, sampleCount: 25, provenance: 'relay' },
      },
      NOW
    )

    expect(record).toEqual({
      date: '2026-05-01',
      timestamp: '2026-05-01T14:30:00.000Z',
      crossMedian: 1100,
      crossFloor: 900,
      totalInventory: 65,
      platformSpreadPct: 18.2,
      platformResults: {
        stubhub: { floor: 900, median: 1000, sampleCount: 40, provenance: 'direct' },
        seatgeek: { floor: 950, median: 1200, sampleCount: 25, provenance: 'relay' },
      },
    })
  })

  it('reports zero spread with a single platform', () => {
    const record = aggregate({ tickpick: { floor: 610, median: 845, sampleCount: 9, provenance: 'direct' } }, NOW)
    expect(record.platformSpreadPct).toBe(0)
    expect(record.crossMedian).toBe(845)
    expect(record.crossFloor).toBe(610)
  })

  it('rounds the cross median to a whole unit', () => {
    const record = aggregate(
      {
        stubhub: { floor: 500, median: 1001, sampleCount: 1, provenance: 'direct' },
        seatgeek: { floor: 500, median: 1002, sampleCount: 1, provenance: 'direct' },
      },
      NOW
    )
    expect(record.crossMedian).toBe(1002)
  })

  it('throws when no platform is active', () => {
    expect(() => aggregate({}, NOW, 5)).toThrow(NoActivePlatformsError)
    expect(() => aggregate({}, NOW, 5)).toThrow(
      'All 5 platforms returned no data (likely blocked); prior history left untouched'
    )
  })
})
