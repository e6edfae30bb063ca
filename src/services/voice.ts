import OpenAI, { toFile } from 'openai'
import { z } from 'zod'
import { ConfigError, ServiceError, errorMessage } from '../lib/errors'
import { durationOf, encodeWav } from '../utils/pcm'
import type { PcmFormat } from '../utils/pcm'
import type { SpeechResult, VoiceConfig, VoiceService } from './synthesis'

/** `pcm` speech output is 24 kHz signed 16-bit little-endian mono. */
const SPEECH_FORMAT: PcmFormat = { sampleRate: 24_000 }

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const

export type OpenAIVoice = (typeof OPENAI_VOICES)[number]

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return OPENAI_VOICES.some((v) => v === voice)
}

const verboseTranscription = z.object({
  text: z.string(),
  segments: z
    .array(
      z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
      })
    )
    .default([]),
})

export interface OpenAIVoiceOptions {
  apiKey?: string
  baseUrl?: string
  /** Speech-to-text model used to read back what was synthesized. */
  transcriptionModel: string
  client?: OpenAI
}

/**
 * Text-to-speech with a read-back: the synthesized clip is transcribed again so the pipeline can compare
 * what was spoken (and where each segment sits) against what was asked for.
 */
export class OpenAIVoiceService implements VoiceService {
  readonly format = SPEECH_FORMAT
  private readonly client: OpenAI
  private readonly transcriptionModel: string

  constructor(options: OpenAIVoiceOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl })
    this.transcriptionModel = options.transcriptionModel
  }

  /** Throws ConfigError for a voice the backend does not offer. */
  static assertVoice(voice: string): void {
    if (!isOpenAIVoice(voice)) {
      throw new ConfigError(`unknown voice "${voice}" (expected one of ${OPENAI_VOICES.join(', ')})`)
    }
  }

  async synthesize(text: string, config: VoiceConfig, signal?: AbortSignal): Promise<SpeechResult> {
    const voice = config.voice
    if (!isOpenAIVoice(voice)) {
      throw new ConfigError(`unknown voice "${voice}"`)
    }

    let audio: Buffer
    try {
      const speech = await this.client.audio.speech.create(
        { model: config.model, voice, input: text, response_format: 'pcm', speed: config.speed },
        { signal }
      )
      audio = Buffer.from(await speech.arrayBuffer())
    } catch (err) {
      throw new ServiceError('synthesis', `speech request failed: ${errorMessage(err)}`, { cause: err })
    }

    let transcription: unknown
    try {
      const file = await toFile(encodeWav(audio, SPEECH_FORMAT), 'speech.wav', { type: 'audio/wav' })
      transcription = await this.client.audio.transcriptions.create(
        {
          file,
          model: this.transcriptionModel,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
        },
        { signal }
      )
    } catch (err) {
      throw new ServiceError('synthesis', `read-back transcription failed: ${errorMessage(err)}`, { cause: err })
    }

    const parsed = verboseTranscription.safeParse(transcription)
    if (!parsed.success) {
      throw new ServiceError('synthesis', 'read-back transcription has no text/segments')
    }
    return {
      audio,
      echoedText: parsed.data.text.trim(),
      duration: durationOf(audio, SPEECH_FORMAT),
      segments: parsed.data.segments
        .map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }))
        .filter((s) => s.text.length > 0),
    }
  }
}
