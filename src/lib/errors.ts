export type DubbingErrorCode =
  | 'VALIDATION'
  | 'SERVICE'
  | 'SYNCHRONIZATION'
  | 'MUX'
  | 'TRANSLATION'
  | 'CUE_SET'
  | 'CONFIG'
  | 'CANCELLED'

/** Base class for every error the pipeline raises on purpose. */
export class DubbingError extends Error {
  readonly code: DubbingErrorCode

  constructor(code: DubbingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Translation reply has the wrong shape or fails a strictness check. Recovered by retry, then bisection. */
export class ValidationError extends DubbingError {
  constructor(message: string) {
    super('VALIDATION', message)
  }
}

/** A collaborator (translation or voice backend) failed. Retried with backoff; fatal for the file when exhausted. */
export class ServiceError extends DubbingError {
  readonly service: 'translation' | 'synthesis'

  constructor(service: 'translation' | 'synthesis', message: string, options?: { cause?: unknown }) {
    super('SERVICE', message, options)
    this.service = service
  }
}

/** Spoken-text echo could not be matched to the requested text. Only raised in strict sync mode. */
export class SynchronizationError extends DubbingError {
  readonly cueIndex: number
  readonly similarity: number

  constructor(cueIndex: number, similarity: number) {
    super('SYNCHRONIZATION', `cue ${cueIndex}: synthesized speech does not match its text (similarity ${similarity.toFixed(2)})`)
    this.cueIndex = cueIndex
    this.similarity = similarity
  }
}

/** A single cue could not be translated and the policy is to abort the file. */
export class TranslationError extends DubbingError {
  readonly cueIndex: number

  constructor(cueIndex: number, reason: string) {
    super('TRANSLATION', `cue ${cueIndex} could not be translated: ${reason}`)
    this.cueIndex = cueIndex
  }
}

export class MuxError extends DubbingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MUX', message, options)
  }
}

export class CueSetError extends DubbingError {
  constructor(message: string) {
    super('CUE_SET', message)
  }
}

export class ConfigError extends DubbingError {
  constructor(message: string) {
    super('CONFIG', message)
  }
}

/** Raised by tasks that notice their file pipeline was aborted after another task failed. */
export class CancelledError extends DubbingError {
  constructor() {
    super('CANCELLED', 'pipeline cancelled')
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError()
}
