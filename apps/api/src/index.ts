// Load environment variables first, before any other imports
import './env'

import {
  createHarvester,
  loadSettings,
  startScrapeScheduler,
  type ScrapeScheduler,
} from '@ticketdesk/harvester'
import { createApp } from './app'
import { logger, loggers } from './config/logger'

const log = loggers.server

async function main(): Promise<void> {
  const settings = loadSettings()
  const harvester = await createHarvester(settings)

  const app = createApp({
    runner: harvester.runner,
    relay: harvester.relay,
    history: harvester.history,
    scrapeToken: settings.scrapeToken,
    serviceName: settings.serviceName,
    eventName: harvester.event.event,
  })

  let scheduler: ScrapeScheduler | null = null
  if (settings.scrapeCron) {
    scheduler = startScrapeScheduler(harvester.runner, settings.scrapeCron)
  }

  const server = app.listen(settings.port, () => {
    log.info('Server listening', {
      port: settings.port,
      service: settings.serviceName,
      schedule: settings.scrapeCron ?? 'manual',
    })
  })

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal })
    scheduler?.stop()
    server.close(() => {
      harvester.runner
        .whenIdle()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Error while waiting for running cycle', {}, error)
          process.exit(1)
        })
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start API', {}, error)
  process.exit(1)
})
