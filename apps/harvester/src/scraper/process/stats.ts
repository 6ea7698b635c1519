/**
 * Price statistics
 *
 * Identical prices collapse to one listing signal: marketplaces mirror the
 * same price across several fields of one listing.
 */

import type { PriceSummary } from '../types.js'

/**
 * Floor, median and count of the distinct prices.
 *
 * Returns null for empty input ("insufficient data"), never a zero floor.
 */
export function summarizePrices(samples: readonly number[]): PriceSummary | null {
  const distinct = Array.from(new Set(samples.filter((value) => Number.isFinite(value)))).sort(
    (a, b) => a - b
  )

  const n = distinct.length
  if (n === 0) return null

  const mid = Math.floor(n / 2)
  const median = n % 2 === 1 ? distinct[mid] : (distinct[mid - 1] + distinct[mid]) / 2

  return {
    floor: Math.round(distinct[0]),
    median: Math.round(median),
    count: n,
  }
}
