import type { HistoryStore, RelayIngestor, ScrapeCycleRunner } from '@ticketdesk/harvester'

/**
 * What the routes need from the harvester. Narrow so tests can pass fakes.
 */
export interface AppDeps {
  runner: Pick<ScrapeCycleRunner, 'trigger' | 'getState'>
  relay: Pick<RelayIngestor, 'submit' | 'list' | 'summarizeFreshness'>
  history: Pick<HistoryStore, 'readRaw'>
  scrapeToken: string
  serviceName: string
  eventName: string
  now?: () => Date
}
