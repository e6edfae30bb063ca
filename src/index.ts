import './env'
import express, { NextFunction, Request, Response } from 'express'
import { initSentry, setupSentryErrorHandler } from './lib/sentry'
initSentry()
import { loadSettings } from './config'
import { DubbingError, errorMessage } from './lib/errors'
import { getLogger } from './lib/logger'
import { requestIdMiddleware } from './middleware/requestId'
import { createHealthRouter } from './routes/health'
import { createJobsRouter } from './routes/jobs'
import { createPipelineDeps } from './runtime'
import { createDubbingQueue, startWorker } from './workers/dubbingProcessor'

const log = getLogger('api')
const PORT = Number(process.env.PORT) || 3001

const settings = loadSettings()
const queue = createDubbingQueue()

const app = express()
app.disable('etag')
app.set('trust proxy', 1)
app.use(requestIdMiddleware)
app.use(express.json())

app.use('/', createHealthRouter(() => queue.getJobCounts()))
app.use('/api', createJobsRouter(queue))

setupSentryErrorHandler(app)

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const code = err instanceof DubbingError ? err.code : 'INTERNAL'
  log.error({ err, code }, 'unhandled request error')
  res.status(err instanceof DubbingError ? 400 : 500).json({ message: errorMessage(err), code })
})

if (process.env.DISABLE_WORKER !== 'true') {
  startWorker(queue, createPipelineDeps(settings), settings.fileConcurrency)
  log.info({ concurrency: settings.fileConcurrency }, 'dubbing worker started in API process')
}

app.listen(PORT, () => {
  log.info({ port: PORT }, 'server listening')
})
