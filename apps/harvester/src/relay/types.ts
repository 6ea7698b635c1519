/**
 * Relay entry types
 */

import type { PlatformId } from '../scraper/types.js'

/**
 * Externally supplied summary for a platform the service cannot reach.
 * One entry per platform; usable only on its own UTC date.
 */
export interface RelayEntry {
  platform: PlatformId
  floor: number
  median: number
  sampleCount: number
  /** UTC date the entry was accepted (YYYY-MM-DD) */
  date: string
  /** ISO timestamp of acceptance */
  timestamp: string
}

export type RelayCache = Partial<Record<PlatformId, RelayEntry>>

export interface RelayLookup {
  getEligible(platform: PlatformId, date: string): Promise<RelayEntry | null>
}

export interface RelayFreshness {
  present: boolean
  fresh: boolean
  date: string | null
  timestamp: string | null
}
