/**
 * Shared-secret check for mutating routes.
 *
 * The token may arrive as `Authorization: Bearer <token>`, an
 * `x-scrape-token` header, or a `token` query parameter. Comparison runs over
 * fixed-length digests so it is constant-time regardless of input length.
 */

import { createHash, timingSafeEqual } from 'node:crypto'
import type { NextFunction, Request, RequestHandler, Response } from 'express'
import { loggers } from '../config/logger'

const log = loggers.auth

export function extractToken(req: Request): string | null {
  const authorization = req.get('authorization')
  if (authorization) {
    const match = /^Bearer\s+(.+)$/i.exec(authorization.trim())
    if (match?.[1]) return match[1]
  }

  const header = req.get('x-scrape-token')
  if (header) return header

  const query = req.query.token
  if (typeof query === 'string' && query.length > 0) return query

  return null
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest()
}

export function tokensMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected))
}

export function requireScrapeToken(expected: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = extractToken(req)
    if (provided === null || !tokensMatch(provided, expected)) {
      log.warn('Rejected request with missing or invalid token', {
        event_name: 'AUTH_REJECTED',
        path: req.path,
        method: req.method,
        supplied: provided !== null,
      })
      res.status(401).json({ error: 'unauthorized' })
      return
    }
    next()
  }
}
