import { Router, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { loggers } from '../config/logger'
import { requireScrapeToken } from '../middleware/auth'
import type { AppDeps } from './deps'

const log = loggers.scrape

/**
 * POST|GET /scrape: start a cycle in the background. GET is kept for
 * cron services that can only issue GETs.
 */
export function createScrapeRouter(deps: Pick<AppDeps, 'runner' | 'scrapeToken'>): RouterType {
  const router: RouterType = Router()

  const handler = (_req: Request, res: Response) => {
    const result = deps.runner.trigger()
    log.info('SCRAPE_TRIGGERED', {
      event_name: 'SCRAPE_TRIGGERED',
      status: result.status,
      startedAt: result.startedAt,
    })

    if (result.status === 'already_running') {
      res.json({ status: 'already_running', startedAt: result.startedAt })
      return
    }
    res.json({ status: 'started', startedAt: result.startedAt })
  }

  router.post('/', requireScrapeToken(deps.scrapeToken), handler)
  router.get('/', requireScrapeToken(deps.scrapeToken), handler)

  return router
}
