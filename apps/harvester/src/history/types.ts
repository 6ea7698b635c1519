/**
 * History document types
 */

import type { PlatformId, PlatformResult } from '../scraper/types.js'

/**
 * One cross-platform summary per UTC calendar date.
 */
export interface DailyRecord {
  /** UTC date, YYYY-MM-DD */
  date: string
  /** ISO timestamp of the cycle that produced it */
  timestamp: string
  crossMedian: number
  crossFloor: number
  totalInventory: number
  platformSpreadPct: number
  platformResults: Partial<Record<PlatformId, PlatformResult>>
}

export interface Trends {
  medianSlope7d: number
  floorAccel: number
  inventoryWowPct: number | null
  priorInventory: number | null
  medians7d: number[]
  floors7d: number[]
  inventory7d: number[]
}

export interface HistoryMeta {
  generated: string
  event: string
  section: string
  row: string | null
  seatType: string | null
  service: string
}

export interface HistoryDocument {
  meta: HistoryMeta
  today: DailyRecord
  trends: Trends
  history: DailyRecord[]
}
