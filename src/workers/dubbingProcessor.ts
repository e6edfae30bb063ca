import Queue from 'bull'
import { z } from 'zod'
import { getLogger, withFileContext } from '../lib/logger'
import { dubFile } from '../services/dubbing'
import type { DubbingDeps, DubbingTask, FileResult } from '../services/dubbing'
import { createRedisClient } from '../utils/redis'

export const DUBBING_QUEUE_NAME = 'dubbing'

/** Worker retries a failed file once (e.g. transient backend outage after retries ran out). */
export const JOB_ATTEMPTS = 2

export const dubbingTaskSchema = z.object({
  subtitlePath: z.string().min(1),
  videoPath: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
})

export const dubbingJobSchema = z.object({
  task: dubbingTaskSchema,
  requestId: z.string().optional(),
})

export interface DubbingJobData {
  task: DubbingTask
  requestId?: string
}

/** The parts of a Bull job the processor uses. */
export interface DubbingJob {
  id: string | number
  data: DubbingJobData
  progress(value: number): Promise<void>
}

export type PipelineDeps = Omit<DubbingDeps, 'logger' | 'onProgress' | 'jobId'>

export function createDubbingQueue(): Queue.Queue<DubbingJobData> {
  return new Queue<DubbingJobData>(DUBBING_QUEUE_NAME, {
    createClient: createRedisClient,
  })
}

/**
 * Runs one queued file. Throws when the file failed so Bull marks the job failed and keeps the reason;
 * the FileResult is the job's return value otherwise.
 */
export async function processDubbingJob(job: DubbingJob, deps: PipelineDeps): Promise<FileResult> {
  const parsed = dubbingJobSchema.safeParse(job.data)
  if (!parsed.success) {
    throw new Error(`invalid job data: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
  }
  const { task, requestId } = parsed.data
  const logger = withFileContext('worker', task.subtitlePath, job.id).child({ requestId })

  const result = await dubFile(task, {
    ...deps,
    logger,
    jobId: job.id,
    onProgress: (_stage, percent) => job.progress(percent),
  })
  if (result.status === 'failed') {
    const reason = result.error ? `${result.error.code}: ${result.error.message}` : 'dubbing failed'
    throw new Error(reason)
  }
  return result
}

function attachQueueEvents(queue: Queue.Queue<DubbingJobData>): void {
  const log = getLogger('worker')
  queue.on('completed', (job) => {
    log.info({ jobId: job.id }, 'job completed')
  })
  queue.on('failed', (job, err) => {
    const retrying = (job.opts.attempts ?? 1) - job.attemptsMade > 0
    log.error({ jobId: job.id, err, retrying }, 'job failed')
  })
}

export function startWorker(queue: Queue.Queue<DubbingJobData>, deps: PipelineDeps, concurrency: number): void {
  queue
    .process(concurrency, (job) => processDubbingJob(job, deps))
    .catch((err: unknown) => {
      getLogger('worker').error({ err }, 'dubbing worker stopped')
    })
  attachQueueEvents(queue)
}
