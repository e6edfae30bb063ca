/**
 * Worker-only process (API runs with DISABLE_WORKER=true).
 */
import './env'
import { initSentry } from './lib/sentry'
initSentry()
import { loadSettings } from './config'
import { getLogger } from './lib/logger'
import { createPipelineDeps } from './runtime'
import { createDubbingQueue, startWorker } from './workers/dubbingProcessor'

const settings = loadSettings()
startWorker(createDubbingQueue(), createPipelineDeps(settings), settings.fileConcurrency)
getLogger('worker').info({ concurrency: settings.fileConcurrency }, 'worker process started')
