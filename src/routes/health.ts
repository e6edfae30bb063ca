/**
 * Health, readiness and version endpoints.
 */
import { Router, Request, Response } from 'express'
import { errorMessage } from '../lib/errors'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const BUILD_TIME = process.env.BUILD_TIME || undefined

const READYZ_TIMEOUT_MS = 5_000

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  return Promise.race([
    p,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms)
    }),
  ]).finally(() => clearTimeout(timer))
}

/** `checkQueue` resolves when Redis answers (e.g. queue.getJobCounts). */
export function createHealthRouter(checkQueue: () => Promise<unknown>): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 200 only if the queue's Redis is reachable */
  router.get('/readyz', async (_req: Request, res: Response) => {
    try {
      await withTimeout(checkQueue(), READYZ_TIMEOUT_MS, 'Redis')
      res.status(200).json({ status: 'ok' })
    } catch (err) {
      res.status(503).json({ status: 'unhealthy', redis: errorMessage(err) || 'Redis unreachable' })
    }
  })

  /** GET /version: service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'api',
      release,
      buildTime: BUILD_TIME,
      env,
    })
  })

  return router
}
