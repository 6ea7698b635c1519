import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import type { AppDeps } from './deps'

/**
 * GET /data: the persisted history document exactly as written.
 */
export function createDataRouter(deps: Pick<AppDeps, 'history'>): RouterType {
  const router: RouterType = Router()

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const raw = await deps.history.readRaw()
      if (raw === null) {
        res.status(404).json({ error: 'No data yet. Trigger a scrape first.' })
        return
      }
      res.type('application/json').send(raw)
    } catch (error) {
      next(error)
    }
  })

  return router
}
