/**
 * History log maintenance and trend derivation.
 * Pure functions over the in-memory log.
 */

import { roundOneDecimal } from '../utils/numbers.js'
import type { DailyRecord, Trends } from './types.js'

const WINDOW = 7

/**
 * Replace any record with the same date, then sort ascending. Idempotent.
 */
export function upsertRecord(history: readonly DailyRecord[], record: DailyRecord): DailyRecord[] {
  return [...history.filter((r) => r.date !== record.date), record].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  )
}

/**
 * Trends from the two most recent records. "Slope" is the day-over-day delta
 * spread over a week, not a regression.
 */
export function computeTrends(history: readonly DailyRecord[]): Trends {
  const latest = history.at(-1)
  const previous = history.at(-2)

  const medians7d = history.slice(-WINDOW).map((r) => r.crossMedian)
  const floors7d = history.slice(-WINDOW).map((r) => r.crossFloor)
  const inventory7d = history.slice(-WINDOW).map((r) => r.totalInventory)

  if (!latest || !previous) {
    return {
      medianSlope7d: 0,
      floorAccel: 0,
      inventoryWowPct: null,
      priorInventory: null,
      medians7d,
      floors7d,
      inventory7d,
    }
  }

  const priorInventory = previous.totalInventory

  return {
    medianSlope7d: roundOneDecimal((latest.crossMedian - previous.crossMedian) / 7),
    floorAccel: roundOneDecimal(latest.crossFloor - previous.crossFloor),
    inventoryWowPct:
      priorInventory === 0
        ? null
        : roundOneDecimal(((latest.totalInventory - priorInventory) / priorInventory) * 100),
    priorInventory,
    medians7d,
    floors7d,
    inventory7d,
  }
}
