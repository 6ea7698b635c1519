import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { RelayValidationError } from '@ticketdesk/harvester'
import { loggers } from '../config/logger'
import { requireScrapeToken } from '../middleware/auth'
import type { AppDeps } from './deps'

const log = loggers.relay

export function createRelayRouter(deps: Pick<AppDeps, 'relay' | 'scrapeToken'>): RouterType {
  const router: RouterType = Router()

  router.post('/', requireScrapeToken(deps.scrapeToken), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const entry = await deps.relay.submit(req.body)
      res.status(201).json({ status: 'accepted', entry })
    } catch (error) {
      if (error instanceof RelayValidationError) {
        log.warn('Relay submission rejected', { event_name: 'RELAY_ENTRY_REJECTED', issues: error.issues })
        res.status(400).json({ error: error.message, issues: error.issues })
        return
      }
      next(error)
    }
  })

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.relay.list())
    } catch (error) {
      next(error)
    }
  })

  return router
}
