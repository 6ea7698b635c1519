/**
 * HTTP Request Logger Middleware
 *
 * ONE structured log entry per request, at response finish:
 * request_id, method, route, status code, latency.
 * Event name: http.request.end
 */

import type { NextFunction, Request, Response } from 'express'
import { loggers } from '../config/logger'
import { classifyError, formatErrorForLog } from '../lib/errors'
import { getRequestId } from './request-context'

const log = loggers.server

/**
 * Paths to skip logging (health checks)
 */
const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

function getRoute(req: Request): string {
  const routePath: unknown = req.route?.path
  if (typeof routePath === 'string') {
    return `${req.baseUrl || ''}${routePath}`
  }
  return req.path
}

/**
 * Calculate latency from high-resolution start time
 */
function calculateLatencyMs(startTime: bigint): number {
  const latencyNs = process.hrtime.bigint() - startTime
  return Math.round((Number(latencyNs) / 1_000_000) * 100) / 100
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.has(req.path)) {
    return next()
  }

  const startTime = process.hrtime.bigint()
  res.locals.startTime = startTime

  res.on('finish', () => {
    const logEntry = {
      event_name: 'http.request.end',
      http: {
        method: req.method,
        route: getRoute(req),
        path: req.path,
        status_code: res.statusCode,
        latency_ms: calculateLatencyMs(startTime),
      },
      request_id: getRequestId(res),
    }

    if (res.statusCode >= 500) {
      log.error('Request completed with error', logEntry)
    } else if (res.statusCode >= 400) {
      log.warn('Request completed with client error', logEntry)
    } else {
      log.info('Request completed', logEntry)
    }
  })

  next()
}

/**
 * Error logging middleware
 *
 * Logs the classified error, then passes it on to the response handler.
 */
export function errorLoggerMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const classified = classifyError(err)
  const startTime: unknown = res.locals.startTime

  const entry = {
    event_name: 'http.request.error',
    http: {
      method: req.method,
      route: getRoute(req),
      path: req.path,
      latency_ms: typeof startTime === 'bigint' ? calculateLatencyMs(startTime) : 0,
    },
    request_id: getRequestId(res),
    ...formatErrorForLog(classified),
  }

  if (classified.isOperational) {
    log.warn('Request failed', entry)
  } else {
    log.error('Unhandled error', entry)
  }

  next(err)
}
