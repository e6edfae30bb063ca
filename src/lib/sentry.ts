/**
 * Sentry for API and worker errors. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 */
import * as Sentry from '@sentry/node'
import type { Express } from 'express'
import { getLogger, redactFilePath } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function enabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!enabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
    })
  } catch (err) {
    getLogger('api').warn({ err }, 'Sentry init failed; continuing without error reporting')
  }
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!enabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Capture a failed file pipeline with file/jobId tags. */
export function captureFileError(file: string, err: unknown, jobId?: string | number): void {
  if (!enabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('file', redactFilePath(file))
    if (jobId !== undefined) scope.setTag('job_id', String(jobId))
    Sentry.captureException(err)
  })
}
