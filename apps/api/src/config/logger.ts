/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@ticketdesk/logger'

// Root logger for API service
export const logger = createLogger('api')

export const loggers = {
  server: logger.child('server'),
  auth: logger.child('auth'),
  scrape: logger.child('scrape'),
  relay: logger.child('relay'),
  data: logger.child('data'),
}
