/**
 * Cross-platform aggregation
 *
 * Combines the platforms that produced a result this cycle into one daily
 * record. Platforms with no data are absent from the input, not zeroes.
 */

import { NoActivePlatformsError } from '../errors.js'
import type { DailyRecord } from '../history/types.js'
import type { PlatformId, PlatformResult } from '../scraper/types.js'
import { utcDate } from '../utils/dates.js'
import { roundOneDecimal } from '../utils/numbers.js'

export type ActivePlatforms = Partial<Record<PlatformId, PlatformResult>>

/**
 * @param attempted - Platforms tried this cycle, for the error message
 * @throws NoActivePlatformsError when no platform is active
 */
export function aggregate(active: ActivePlatforms, now: Date, attempted?: number): DailyRecord {
  const results = Object.values(active).filter((r): r is PlatformResult => r !== undefined)
  if (results.length === 0) {
    throw new NoActivePlatformsError(attempted ?? 0)
  }

  const medians = results.map((r) => r.median)
  const floors = results.map((r) => r.floor)

  const crossMedian = Math.round(medians.reduce((sum, m) => sum + m, 0) / medians.length)
  const crossFloor = Math.round(Math.min(...floors))

  const platformSpreadPct =
    results.length < 2 || crossMedian === 0
      ? 0
      : roundOneDecimal(((Math.max(...medians) - Math.min(...medians)) / crossMedian) * 100)

  return {
    date: utcDate(now),
    timestamp: now.toISOString(),
    crossMedian,
    crossFloor,
    totalInventory: results.reduce((sum, r) => sum + r.sampleCount, 0),
    platformSpreadPct,
    platformResults: { ...active },
  }
}
