import pLimit from 'p-limit'
import type { Cue, CueSet } from '../models/cue'
import type { Logger } from '../lib/logger'
import { silentLogger } from '../lib/logger'
import {
  CancelledError,
  ConfigError,
  ServiceError,
  SynchronizationError,
  errorMessage,
  throwIfAborted,
} from '../lib/errors'
import type { RateLimiter } from '../utils/rateLimiter'
import { alignSegments, bestSpanMatch, similarity } from '../utils/similarity'
import { durationOf, framesOf, sliceSeconds } from '../utils/pcm'
import type { PcmFormat } from '../utils/pcm'
import { waitBackoff } from './translation'
import type { RetryPolicy } from './translation'

export interface VoiceConfig {
  voice: string
  model: string
  speed?: number
}

/** A stretch of the synthesized audio and the text the engine reports for it. Times in seconds. */
export interface SpokenSegment {
  text: string
  start: number
  end: number
}

export interface SpeechResult {
  /** PCM in the service's format. */
  audio: Buffer
  /** What the engine believes it spoke. */
  echoedText: string
  duration: number
  /** Per-segment boundaries when the engine reports them; may be empty. */
  segments: SpokenSegment[]
}

export interface VoiceService {
  readonly format: PcmFormat
  synthesize(text: string, voice: VoiceConfig, signal?: AbortSignal): Promise<SpeechResult>
}

export interface AudioSegment {
  cueIndex: number
  samples: Buffer
  duration: number
  similarity: number
  /** Audio was trimmed or split to the part of the echo that matches the cue. */
  recovered: boolean
  /** Even after recovery the speech does not match the cue text. */
  desynced: boolean
}

export interface SynthesizerOptions {
  voice: VoiceConfig
  similarityThreshold: number
  /** Join consecutive cues into one request up to this many characters; 0 sends one request per cue. */
  groupMaxChars: number
  /** Fail the file on a desynced cue instead of shipping it with a warning. */
  strictSync: boolean
  retry: RetryPolicy
  maxConcurrent: number
}

export interface SynthesisReport {
  /** In cue order. */
  segments: AudioSegment[]
  requests: number
  recovered: number[]
  desynced: number[]
}

/** Cues spoken in one request. */
export function groupCues(cues: readonly Cue[], maxChars: number): Cue[][] {
  if (maxChars <= 0) return cues.map((cue) => [cue])
  const groups: Cue[][] = []
  let current: Cue[] = []
  let chars = 0
  for (const cue of cues) {
    const length = cue.translatedText.length
    if (current.length > 0 && chars + length > maxChars) {
      groups.push(current)
      current = []
      chars = 0
    }
    current.push(cue)
    chars += length
  }
  if (current.length > 0) groups.push(current)
  return groups
}

const wordSegmenter = new Intl.Segmenter(undefined, { granularity: 'word' })

/** Word-like pieces of the text; scripts written without spaces (Han, Kana, Thai) are split by dictionary. */
export function spokenWords(text: string): string[] {
  const words: string[] = []
  for (const { segment, isWordLike } of wordSegmenter.segment(text)) {
    if (isWordLike) words.push(segment)
  }
  return words
}

/**
 * Engine-reported segments, or the echo's words spread over the clip by character count when the
 * engine reports no timing.
 */
export function timedUnits(result: SpeechResult, format: PcmFormat): SpokenSegment[] {
  if (result.segments.length > 0) return result.segments
  const words = spokenWords(result.echoedText)
  const totalChars = words.reduce((sum, w) => sum + w.length, 0)
  const total = durationOf(result.audio, format)
  const units: SpokenSegment[] = []
  let consumed = 0
  for (const word of words) {
    const start = totalChars === 0 ? 0 : (consumed / totalChars) * total
    consumed += word.length
    const end = totalChars === 0 ? total : (consumed / totalChars) * total
    units.push({ text: word, start, end })
  }
  return units
}

/**
 * Checks one cue's synthesized speech against its text. Below the threshold, the audio is cut down to the
 * run of spoken units that best matches the cue.
 */
export function realignSingle(
  cue: Cue,
  result: SpeechResult,
  format: PcmFormat,
  threshold: number
): AudioSegment {
  const direct = similarity(result.echoedText, cue.translatedText)
  if (direct >= threshold) {
    return segmentOf(cue.index, result.audio, format, direct, false, false)
  }
  const units = timedUnits(result, format)
  const span = bestSpanMatch(
    units.map((u) => u.text),
    cue.translatedText
  )
  if (!span || span.score <= direct) {
    return segmentOf(cue.index, result.audio, format, direct, false, true)
  }
  const samples = sliceSeconds(result.audio, units[span.start].start, units[span.end - 1].end, format)
  return segmentOf(cue.index, samples, format, span.score, true, span.score < threshold)
}

/**
 * Splits the speech for several joined cues back onto the cues, cutting the audio at segment boundaries.
 */
export function splitMerged(
  cues: readonly Cue[],
  result: SpeechResult,
  format: PcmFormat,
  threshold: number
): AudioSegment[] {
  const units = timedUnits(result, format)
  const groups = alignSegments(
    units.map((u) => u.text),
    cues.map((c) => c.translatedText)
  )
  return groups.map((group, i) => {
    const cue = cues[i]
    if (group.end === group.start) {
      return segmentOf(cue.index, Buffer.alloc(0), format, group.score, true, true)
    }
    const samples = sliceSeconds(result.audio, units[group.start].start, units[group.end - 1].end, format)
    return segmentOf(cue.index, samples, format, group.score, true, group.score < threshold)
  })
}

function segmentOf(
  cueIndex: number,
  samples: Buffer,
  format: PcmFormat,
  score: number,
  recovered: boolean,
  desynced: boolean
): AudioSegment {
  return {
    cueIndex,
    samples,
    duration: durationOf(samples, format),
    similarity: score,
    recovered,
    desynced,
  }
}

/**
 * Produces one AudioSegment per cue with translated text. Requests run concurrently behind the shared
 * rate limiter and are joined back to cues by index.
 */
export class Synthesizer {
  constructor(
    private readonly service: VoiceService,
    private readonly limiter: RateLimiter,
    private readonly options: SynthesizerOptions,
    private readonly logger: Logger = silentLogger()
  ) {}

  async synthesize(cueSet: CueSet, opts: { signal?: AbortSignal } = {}): Promise<SynthesisReport> {
    const { signal } = opts
    const groups = groupCues(cueSet.voiced(), this.options.groupMaxChars)
    const limit = pLimit(this.options.maxConcurrent)
    const report: SynthesisReport = { segments: [], requests: 0, recovered: [], desynced: [] }
    this.logger.info({ cues: cueSet.size, requests: groups.length, voice: this.options.voice.voice }, 'synthesis started')

    const results = await Promise.all(groups.map((group) => limit(() => this.synthesizeGroup(group, report, signal))))
    const byIndex = new Map(results.flat().map((segment) => [segment.cueIndex, segment]))

    for (const cue of cueSet) {
      const segment = byIndex.get(cue.index)
      if (!segment) continue
      report.segments.push(segment)
      if (segment.recovered) report.recovered.push(cue.index)
      if (segment.desynced) report.desynced.push(cue.index)
    }
    this.logger.info(
      { segments: report.segments.length, recovered: report.recovered.length, desynced: report.desynced.length },
      'synthesis finished'
    )
    return report
  }

  private async synthesizeGroup(group: Cue[], report: SynthesisReport, signal: AbortSignal | undefined): Promise<AudioSegment[]> {
    const text = group.map((cue) => cue.translatedText).join('\n')
    const result = await this.request(text, report, signal)
    const { format } = this.service
    const { similarityThreshold } = this.options

    const segments =
      group.length === 1
        ? [realignSingle(group[0], result, format, similarityThreshold)]
        : splitMerged(group, result, format, similarityThreshold)

    for (const segment of segments) {
      if (segment.desynced) {
        if (this.options.strictSync) throw new SynchronizationError(segment.cueIndex, segment.similarity)
        this.logger.warn(
          { cue: segment.cueIndex, similarity: Number(segment.similarity.toFixed(3)) },
          'synthesized speech does not match cue text'
        )
      } else if (segment.recovered) {
        this.logger.debug({ cue: segment.cueIndex, frames: framesOf(segment.samples) }, 'speech realigned to cue')
      }
    }
    return segments
  }

  private async request(text: string, report: SynthesisReport, signal: AbortSignal | undefined): Promise<SpeechResult> {
    const { retry, voice } = this.options
    let lastError: ServiceError | undefined
    for (let attempt = 1; attempt <= retry.attempts; attempt++) {
      if (attempt > 1) {
        await waitBackoff(retry, attempt - 1, signal)
      }
      throwIfAborted(signal)
      await this.limiter.acquire('synthesis')
      throwIfAborted(signal)
      report.requests++
      try {
        return await this.service.synthesize(text, voice, signal)
      } catch (err) {
        if (signal?.aborted) throw new CancelledError()
        if (err instanceof ConfigError) throw err
        lastError = err instanceof ServiceError ? err : new ServiceError('synthesis', errorMessage(err), { cause: err })
        this.logger.warn({ attempt, chars: text.length, reason: lastError.message }, 'synthesis attempt failed')
      }
    }
    throw lastError ?? new ServiceError('synthesis', 'no attempts made')
  }
}
