/**
 * Production wiring: one rate limiter per process, OpenAI-backed collaborators, the ffmpeg muxer.
 */
import type { DubbingSettings } from './config'
import { RateLimiter } from './utils/rateLimiter'
import { OpenAITranslationService } from './services/llm'
import { OpenAIVoiceService } from './services/voice'
import { ffmpegMuxer } from './services/ffmpeg'
import type { DubbingDeps } from './services/dubbing'

export function createRateLimiter(settings: Readonly<DubbingSettings>): RateLimiter {
  return new RateLimiter({
    translation: settings.rateLimits.translation,
    synthesis: settings.rateLimits.synthesis,
  })
}

export function createPipelineDeps(settings: Readonly<DubbingSettings>): DubbingDeps {
  if (settings.synthesize) OpenAIVoiceService.assertVoice(settings.synthesis.voice)
  const { apiKey, baseUrl } = settings.openai
  return {
    settings,
    limiter: createRateLimiter(settings),
    translationService: new OpenAITranslationService({ apiKey, baseUrl, model: settings.translation.model }),
    voiceService: new OpenAIVoiceService({
      apiKey,
      baseUrl,
      transcriptionModel: settings.synthesis.transcriptionModel,
    }),
    muxer: ffmpegMuxer,
  }
}
