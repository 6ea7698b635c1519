/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@ticketdesk/logger'

export const logger = createLogger('harvester')

export const loggers = {
  cycle: logger.child('cycle'),
  scraper: logger.child('scraper'),
  fetch: logger.child('fetch'),
  history: logger.child('history'),
  relay: logger.child('relay'),
  storage: logger.child('storage'),
  scheduler: logger.child('scheduler'),
  config: logger.child('config'),
}
