import pLimit from 'p-limit'
import { setTimeout as sleep } from 'timers/promises'
import type { CueSet } from '../models/cue'
import type { Logger } from '../lib/logger'
import { silentLogger } from '../lib/logger'
import {
  CancelledError,
  ServiceError,
  TranslationError,
  ValidationError,
  errorMessage,
  throwIfAborted,
} from '../lib/errors'
import type { RateLimiter } from '../utils/rateLimiter'
import { bisect, createBatches } from '../utils/batcher'
import type { Batch, BatchLimits } from '../utils/batcher'
import { decodeReply, encodeLines, stripTrailingEllipsis } from '../utils/translationCodec'
import type { ResponseCheck, TranslationMode } from '../utils/translationCodec'

export interface TranslationRequest {
  payload: string
  mode: TranslationMode
  targetLanguage: string
  lineCount: number
}

/** Translation backend. Resolves with the raw reply text; any rejection counts as a service failure. */
export interface TranslationService {
  translate(request: TranslationRequest, signal?: AbortSignal): Promise<string>
}

export interface RetryPolicy {
  /** Attempts per batch (or per cue for synthesis), including the first. */
  attempts: number
  /** Delay before the second attempt; doubles after each further failure. */
  baseDelayMs: number
}

export interface TranslatorOptions {
  targetLanguage: string
  mode: TranslationMode
  batch: BatchLimits
  retry: RetryPolicy
  checks: ResponseCheck[]
  removeEllipsis: boolean
  /** What to do with a cue that fails on its own: keep its source text, or fail the file. */
  onCueFailure: 'source' | 'abort'
  maxConcurrent: number
}

export type BatchState =
  | { status: 'pending' }
  | { status: 'requested'; attempt: number }
  | { status: 'retrying'; attempt: number; reason: string }
  | { status: 'bisected'; halves: [Batch, Batch] }
  | { status: 'accepted'; attempt: number }
  | { status: 'failed'; reason: string }

export interface BatchTransition {
  indices: number[]
  state: BatchState
}

export interface CueFailure {
  index: number
  reason: string
}

export interface TranslationReport {
  batches: number
  requests: number
  transitions: BatchTransition[]
  failedCues: CueFailure[]
}

type Settled = { status: 'accepted' } | { status: 'bisected'; halves: [Batch, Batch] } | { status: 'failed'; reason: string }

export function backoffDelay(policy: RetryPolicy, failures: number): number {
  return policy.baseDelayMs * 2 ** (failures - 1)
}

/** Sleeps before the next attempt; an abort ends the wait with CancelledError. */
export async function waitBackoff(policy: RetryPolicy, failures: number, signal: AbortSignal | undefined): Promise<void> {
  try {
    await sleep(backoffDelay(policy, failures), undefined, { signal })
  } catch (err) {
    if (signal?.aborted) throw new CancelledError()
    throw err
  }
}

/**
 * Resolves translated text for every cue. Batches run concurrently behind the shared rate limiter;
 * a batch whose replies keep failing validation is halved until the offending cue is isolated.
 */
export class Translator {
  constructor(
    private readonly service: TranslationService,
    private readonly limiter: RateLimiter,
    private readonly options: TranslatorOptions,
    private readonly logger: Logger = silentLogger()
  ) {}

  async translate(cueSet: CueSet, opts: { signal?: AbortSignal } = {}): Promise<TranslationReport> {
    const { signal } = opts
    const batches = createBatches(cueSet, this.options.batch)
    const limit = pLimit(this.options.maxConcurrent)
    const report: TranslationReport = { batches: batches.length, requests: 0, transitions: [], failedCues: [] }
    this.logger.info({ cues: cueSet.size, batches: batches.length, mode: this.options.mode }, 'translation started')

    const record = (batch: Batch, state: BatchState) => {
      report.transitions.push({ indices: batch.indices, state })
      this.logger.debug({ cues: batch.indices, ...state }, 'batch state')
    }

    const settle = async (batch: Batch): Promise<void> => {
      record(batch, { status: 'pending' })
      const outcome = await limit(() => this.attempt(cueSet, batch, report, record, signal))
      if (outcome.status === 'bisected') {
        await Promise.all(outcome.halves.map(settle))
        return
      }
      if (outcome.status === 'failed') {
        const index = batch.indices[0]
        if (this.options.onCueFailure === 'abort') {
          throw new TranslationError(index, outcome.reason)
        }
        this.logger.warn({ cue: index, reason: outcome.reason }, 'cue left untranslated, using source text')
        cueSet.setTranslation(index, cueSet.get(index).sourceText)
        report.failedCues.push({ index, reason: outcome.reason })
      }
    }

    await Promise.all(batches.map(settle))
    report.failedCues.sort((a, b) => a.index - b.index)
    this.logger.info(
      { requests: report.requests, failedCues: report.failedCues.length },
      'translation finished'
    )
    return report
  }

  private async attempt(
    cueSet: CueSet,
    batch: Batch,
    report: TranslationReport,
    record: (batch: Batch, state: BatchState) => void,
    signal: AbortSignal | undefined
  ): Promise<Settled> {
    const { retry, mode, targetLanguage } = this.options
    const sources = batch.indices.map((index) => cueSet.get(index).sourceText)
    const payload = encodeLines(sources, mode)
    let lastError: ValidationError | ServiceError | undefined

    for (let attempt = 1; attempt <= retry.attempts; attempt++) {
      if (attempt > 1) {
        await waitBackoff(retry, attempt - 1, signal)
      }
      throwIfAborted(signal)
      await this.limiter.acquire('translation')
      throwIfAborted(signal)

      record(batch, { status: 'requested', attempt })
      report.requests++
      try {
        const reply = await this.service.translate(
          { payload, mode, targetLanguage, lineCount: batch.indices.length },
          signal
        )
        const lines = this.validate(sources, reply)
        batch.indices.forEach((index, i) => cueSet.setTranslation(index, lines[i]))
        record(batch, { status: 'accepted', attempt })
        return { status: 'accepted' }
      } catch (err) {
        if (signal?.aborted) throw new CancelledError()
        lastError =
          err instanceof ValidationError || err instanceof ServiceError
            ? err
            : new ServiceError('translation', errorMessage(err), { cause: err })
        this.logger.warn({ cues: batch.indices, attempt, code: lastError.code, reason: lastError.message }, 'translation attempt failed')
        if (attempt < retry.attempts) {
          record(batch, { status: 'retrying', attempt, reason: lastError.message })
        }
      }
    }

    const reason = lastError?.message ?? 'no attempts made'
    if (lastError instanceof ServiceError) {
      record(batch, { status: 'failed', reason })
      throw lastError
    }
    if (batch.indices.length > 1) {
      const halves = bisect(batch)
      record(batch, { status: 'bisected', halves })
      return { status: 'bisected', halves }
    }
    record(batch, { status: 'failed', reason })
    return { status: 'failed', reason }
  }

  private validate(sources: string[], reply: string): string[] {
    let lines = decodeReply(reply, this.options.mode, sources.length)
    if (this.options.removeEllipsis) {
      lines = lines.map(stripTrailingEllipsis)
    }
    lines.forEach((line, i) => {
      for (const check of this.options.checks) {
        const reason = check(sources[i], line)
        if (reason) throw new ValidationError(`line ${i + 1}: ${reason}`)
      }
    })
    return lines
  }
}
