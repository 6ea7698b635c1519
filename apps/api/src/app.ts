/**
 * Express App Configuration (without server startup)
 *
 * createApp() builds the app from its harvester dependencies for use in:
 * - route tests (via supertest)
 * - index.ts (actual server startup)
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { classifyError, getSafeMessage } from './lib/errors'
import { getRequestId, requestContextMiddleware } from './middleware/request-context'
import { errorLoggerMiddleware, requestLoggerMiddleware } from './middleware/request-logger'
import { createDataRouter } from './routes/data'
import type { AppDeps } from './routes/deps'
import { createRelayRouter } from './routes/relay'
import { createScrapeRouter } from './routes/scrape'
import { createStatusRouter } from './routes/status'

export type { AppDeps } from './routes/deps'

const ENDPOINTS = {
  'GET /health': 'liveness',
  'GET /status': 'scrape state and relay freshness',
  'POST /scrape': 'start a scrape cycle (token)',
  'GET /data': 'history document',
  'POST /relay': 'submit a relay entry (token)',
  'GET /relay': 'relay cache',
}

export function createApp(deps: AppDeps): Express {
  const app: Express = express()

  app.use(helmet())
  app.set('trust proxy', 1)

  app.use(requestContextMiddleware)
  app.use(requestLoggerMiddleware)

  // The dashboard is static and may be hosted anywhere
  app.use(cors())
  app.use(express.json({ limit: '16kb' }))

  app.get('/', (_req, res) => {
    res.json({
      service: deps.serviceName,
      event: deps.eventName,
      endpoints: ENDPOINTS,
      status: 'ok',
    })
  })

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: (deps.now?.() ?? new Date()).toISOString() })
  })

  app.use('/status', createStatusRouter(deps))
  app.use('/scrape', createScrapeRouter(deps))
  app.use('/data', createDataRouter(deps))
  app.use('/relay', createRelayRouter(deps))

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' })
  })

  app.use(errorLoggerMiddleware)

  // Final error handler - safe response only, never err.message or stack
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const classified = classifyError(err)
    const response: Record<string, unknown> = {
      error: getSafeMessage(classified),
      errorCode: classified.code,
      requestId: getRequestId(res),
    }

    if (classified.code === 'VALIDATION_FAILED' && classified.details?.issues) {
      response.validationErrors = classified.details.issues
    }

    res.status(classified.statusCode).json(response)
  })

  return app
}
