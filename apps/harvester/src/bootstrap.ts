/**
 * Service assembly
 *
 * Wires settings, the event definition and the platform registry into the
 * stores and the cycle runner. Entry points (CLI, API) call this once.
 */

import { registerAllAdapters } from './scraper/adapters/index.js'
import { loadEventDefinition, type EventDefinition } from './config/event.js'
import { loggers } from './config/logger.js'
import type { Settings } from './config/settings.js'
import { ScrapeCycleRunner } from './cycle/runner.js'
import { HistoryStore } from './history/history-store.js'
import { RelayIngestor } from './relay/relay-ingestor.js'
import { HttpFetcher } from './scraper/fetch/http-fetcher.js'
import { buildPlatformScrapers } from './scraper/platform-scraper.js'
import { InMemoryPlatformRegistry } from './scraper/registry.js'
import { DEFAULT_RETRY_POLICY, type Fetcher, type PlatformRegistry } from './scraper/types.js'

export interface Harvester {
  settings: Settings
  event: EventDefinition
  registry: PlatformRegistry
  history: HistoryStore
  relay: RelayIngestor
  runner: ScrapeCycleRunner
}

export interface HarvesterOverrides {
  /** Replaces the HTTP fetcher (tests) */
  fetcher?: Fetcher
  event?: EventDefinition
  now?: () => Date
}

export async function createHarvester(settings: Settings, overrides: HarvesterOverrides = {}): Promise<Harvester> {
  const event = overrides.event ?? (await loadEventDefinition(settings.eventConfigPath))
  const registry = registerAllAdapters(new InMemoryPlatformRegistry())

  const fetcher =
    overrides.fetcher ??
    new HttpFetcher({
      timeoutMs: settings.fetchTimeoutMs,
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: settings.fetchMaxAttempts },
    })

  const relay = new RelayIngestor({
    path: settings.relayFile,
    registry,
    bounds: settings.bounds,
    lockTimeoutMs: settings.lockTimeoutMs,
    now: overrides.now,
  })

  const history = new HistoryStore({
    path: settings.historyFile,
    meta: {
      event: event.event,
      section: event.section,
      row: event.row,
      seatType: event.seatType,
      service: settings.serviceName,
    },
    lockTimeoutMs: settings.lockTimeoutMs,
    now: overrides.now,
  })

  const scrapers = buildPlatformScrapers(registry, event, {
    fetcher,
    relay,
    bounds: settings.bounds,
    fetchTimeoutMs: settings.fetchTimeoutMs,
  })

  const runner = new ScrapeCycleRunner({
    scrapers,
    history,
    bounds: settings.bounds,
    pacing: settings.pacing,
    cycleDeadlineMs: settings.cycleDeadlineMs,
    now: overrides.now,
  })

  loggers.cycle.info('Harvester ready', {
    event: event.event,
    platforms: registry.list().map((a) => a.id),
    dataDir: settings.dataDir,
  })

  return { settings, event, registry, history, relay, runner }
}
