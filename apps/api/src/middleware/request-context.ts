/**
 * Request Context Middleware
 *
 * Assigns a request id (honouring an inbound x-request-id) for log
 * correlation and echoes it on the response.
 */

import { randomUUID } from 'node:crypto'
import type { NextFunction, Request, Response } from 'express'

const MAX_INBOUND_ID_LENGTH = 128

export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId
  return typeof id === 'string' ? id : 'unknown'
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get('x-request-id')
  const requestId =
    inbound && inbound.length <= MAX_INBOUND_ID_LENGTH && /^[\w.-]+$/.test(inbound) ? inbound : randomUUID()

  res.locals.requestId = requestId
  res.setHeader('x-request-id', requestId)
  next()
}
