import { CueSet } from '../models/cue'
import { RateLimiter } from '../utils/rateLimiter'
import { decodeReply, encodeLines } from '../utils/translationCodec'
import type { TranslationRequest, TranslationService } from '../services/translation'
import type { SpeechResult, VoiceConfig, VoiceService } from '../services/synthesis'
import type { PcmFormat } from '../utils/pcm'

/** Cues numbered from 1: [start, end, text]. */
export function cueSetOf(rows: Array<[number, number, string]>): CueSet {
  return new CueSet(rows.map(([start, end, sourceText], i) => ({ index: i + 1, start, end, sourceText })))
}

export function fastLimiter(): RateLimiter {
  return new RateLimiter({
    translation: { requests: 1000, windowMs: 1 },
    synthesis: { requests: 1000, windowMs: 1 },
  })
}

/** `frames` samples of a constant non-zero level. */
export function tone(frames: number, level = 100): Buffer {
  const buffer = Buffer.alloc(frames * 2)
  for (let f = 0; f < frames; f++) buffer.writeInt16LE(level, f * 2)
  return buffer
}

/** Translates each line with `translateLine`, replying in the request's own format. */
export class StubTranslationService implements TranslationService {
  readonly requests: TranslationRequest[] = []

  constructor(private readonly translateLine: (line: string) => string = (line) => line.toUpperCase()) {}

  async translate(request: TranslationRequest): Promise<string> {
    this.requests.push(request)
    const lines = decodeReply(request.payload, request.mode, request.lineCount)
    return encodeLines(lines.map(this.translateLine), request.mode)
  }
}

export const TEST_FORMAT: PcmFormat = { sampleRate: 1000 }

/** Speaks every text back verbatim, 100 ms per character, no segment timing. */
export class StubVoiceService implements VoiceService {
  readonly format = TEST_FORMAT
  readonly requests: string[] = []

  constructor(private readonly respond?: (text: string) => SpeechResult) {}

  async synthesize(text: string, _voice: VoiceConfig): Promise<SpeechResult> {
    this.requests.push(text)
    if (this.respond) return this.respond(text)
    const frames = text.length * 100
    return { audio: tone(frames), echoedText: text, duration: frames / 1000, segments: [] }
  }
}
