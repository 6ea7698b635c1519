/**
 * @ticketdesk/harvester
 *
 * Multi-marketplace acquisition and aggregation pipeline. The API imports
 * from here; nothing else in this package is public.
 */

export { createHarvester, type Harvester, type HarvesterOverrides } from './bootstrap.js'
export { loadSettings, type Settings } from './config/settings.js'
export { loadEventDefinition, parseEventDefinition, type EventDefinition } from './config/event.js'
export {
  ScrapeCycleRunner,
  type CycleResult,
  type ScrapeState,
  type TriggerResult,
} from './cycle/runner.js'
export { startScrapeScheduler, nextFireTime, type ScrapeScheduler } from './cycle/scheduler.js'
export { formatCycleSummary } from './cycle/summary.js'
export { HistoryStore } from './history/history-store.js'
export type { DailyRecord, HistoryDocument, Trends } from './history/types.js'
export { RelayIngestor, relaySubmissionSchema, type RelaySubmission } from './relay/relay-ingestor.js'
export type { RelayCache, RelayEntry, RelayFreshness } from './relay/types.js'
export { PLATFORM_IDS, isPlatformId, type PlatformId, type PlatformResult } from './scraper/types.js'
export * from './errors.js'
export { utcDate } from './utils/dates.js'
