/**
 * Structured JSON logger for API, worker and CLI. Single format: level, timestamp, service, env, release,
 * plus file/jobId on pipeline children. Redacts known sensitive keys.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'info'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'req.headers.authorization',
  'openaiApiKey',
  '*.openaiApiKey',
  'OPENAI_API_KEY',
  'SENTRY_DSN',
  'REDIS_URL',
  'redisUrl',
  '*.redisUrl',
]

export type ServiceName = 'api' | 'worker' | 'cli'

export type Logger = pino.Logger

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Create a child logger with requestId (for API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger for one file's pipeline. Only the basename of the file is logged. */
export function withFileContext(service: ServiceName, file: string, jobId?: string | number): pino.Logger {
  return getLogger(service).child({
    file: redactFilePath(file),
    jobId: jobId === undefined ? undefined : String(jobId),
  })
}

/** Logger that drops everything; for tests and library callers that bring no logger. */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' })
}

/** Redact a string for safe logging (e.g. file paths: keep basename only). */
export function redactFilePath(path: string): string {
  if (!path) return '[REDACTED]'
  const parts = path.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
