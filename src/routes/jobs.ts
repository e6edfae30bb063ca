import express, { Request, Response } from 'express'
import fs from 'fs'
import { withRequestId } from '../lib/logger'
import { errorMessage } from '../lib/errors'
import { requestIdOf } from '../middleware/requestId'
import { JOB_ATTEMPTS, dubbingTaskSchema } from '../workers/dubbingProcessor'
import type { DubbingJobData } from '../workers/dubbingProcessor'

type JobId = string | number

/** The parts of a Bull job the status endpoint reads. */
export interface QueuedJob {
  id: JobId
  getState(): Promise<string>
  progress(): unknown
  returnvalue: unknown
  failedReason?: string
}

/** The parts of the Bull queue the routes use. */
export interface DubbingQueue {
  add(data: DubbingJobData, opts?: { attempts?: number }): Promise<{ id: JobId }>
  getJob(jobId: JobId): Promise<QueuedJob | null>
}

const NO_STORE = {
  'Cache-Control': 'no-store, no-cache, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
}

export function createJobsRouter(queue: DubbingQueue): express.Router {
  const router = express.Router()

  /** POST /api/dub: enqueue one subtitle file (paths are on the worker's filesystem). */
  router.post('/dub', async (req: Request, res: Response) => {
    const parsed = dubbingTaskSchema.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({
        message: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
        code: 'VALIDATION',
      })
    }
    const task = parsed.data
    const missing = [task.subtitlePath, task.videoPath].find((p) => p !== undefined && !fs.existsSync(p))
    if (missing) {
      return res.status(400).json({ message: `File not found: ${missing}`, code: 'VALIDATION' })
    }
    const requestId = requestIdOf(res)
    try {
      const job = await queue.add({ task, requestId }, { attempts: JOB_ATTEMPTS })
      withRequestId(requestId).info({ jobId: job.id }, 'dubbing job queued')
      return res.status(202).json({ jobId: String(job.id) })
    } catch (err) {
      withRequestId(requestId).error({ err }, 'could not queue dubbing job')
      return res.status(503).json({ message: errorMessage(err), code: 'QUEUE_UNAVAILABLE' })
    }
  })

  /** GET /api/jobs/:jobId: state, progress (0-100), FileResult once completed. */
  router.get('/jobs/:jobId', async (req: Request, res: Response) => {
    res.set(NO_STORE)
    try {
      const job = await queue.getJob(req.params.jobId)
      if (!job) {
        return res.status(404).json({ message: 'Job not found' })
      }
      const state = await job.getState()
      const progress = Number(job.progress())
      return res.status(200).json({
        jobId: String(job.id),
        state,
        progress: Number.isFinite(progress) ? progress : 0,
        ...(state === 'completed' && { result: job.returnvalue }),
        ...(state === 'failed' && { failedReason: job.failedReason }),
      })
    } catch (err) {
      withRequestId(requestIdOf(res)).error({ err }, 'job status lookup failed')
      return res.status(500).json({ message: errorMessage(err) || 'Failed to get job status' })
    }
  })

  return router
}
