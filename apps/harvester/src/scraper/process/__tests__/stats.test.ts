import { describe, expect, it } from 'vitest'
import { summarizePrices } from '../stats.js'

describe('summarizePrices', () => {
  it('deduplicates before computing floor, median and count', () => {
    expect(summarizePrices([100, 100, 200])).toEqual({ floor: 100, median: 150, count: 2 })
  })

  it('averages the two middle values for an even count', () => {
    expect(summarizePrices([400, 100, 300, 200])).toEqual({ floor: 100, median: 250, count: 4 })
  })

  it('takes the middle value for an odd count', () => {
    expect(summarizePrices([950, 700, 1200])).toEqual({ floor: 700, median: 950, count: 3 })
  })

  it('rounds floor and median to whole units', () => {
    expect(summarizePrices([450.6, 701.5])).toEqual({ floor: 451, median: 576, count: 2 })
  })

  it('returns null for no samples', () => {
    expect(summarizePrices([])).toBeNull()
  })
})
