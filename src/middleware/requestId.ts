/**
 * Request ID middleware: reuse x-request-id from the edge proxy or generate a UUID.
 * Echoed in the response header and carried into the queued job for log correlation.
 */
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4()
  res.locals.requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

export function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId
  return typeof id === 'string' ? id : undefined
}
