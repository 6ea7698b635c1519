import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { utcDate } from '@ticketdesk/harvester'
import type { AppDeps } from './deps'

export function createStatusRouter(deps: Pick<AppDeps, 'runner' | 'relay' | 'serviceName' | 'now'>): RouterType {
  const router: RouterType = Router()

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const now = deps.now?.() ?? new Date()
      const relay = await deps.relay.summarizeFreshness(utcDate(now))
      res.json({
        ...deps.runner.getState(),
        relay,
        service: deps.serviceName,
      })
    } catch (error) {
      next(error)
    }
  })

  return router
}
