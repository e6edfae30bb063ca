/**
 * Settings for one process: read from env (DUB_* and OPENAI_*), then an optional JSON file, then explicit
 * overrides (CLI flags), validated once and frozen. The pipeline never reads process.env itself.
 */
import fs from 'fs'
import { z } from 'zod'
import { ConfigError, errorMessage } from './lib/errors'
import { isKnownScript, rejectEmpty, rejectPassthrough, requireScript } from './utils/translationCodec'
import type { ResponseCheck } from './utils/translationCodec'

const rateSchema = z.object({
  requests: z.number().int().positive(),
  windowMs: z.number().positive(),
})

export const settingsSchema = z.object({
  translate: z.boolean().default(true),
  synthesize: z.boolean().default(true),
  openai: z
    .object({
      apiKey: z.string().optional(),
      baseUrl: z.string().url().optional(),
    })
    .default({}),
  translation: z
    .object({
      targetLanguage: z.string().min(1).default('Simplified Chinese'),
      model: z.string().min(1).default('gpt-4o-mini'),
      mode: z.enum(['plain', 'html']).default('html'),
      batchSize: z.number().int().positive().default(10),
      maxChars: z.number().int().positive().optional(),
      sectionGap: z.number().positive().optional(),
      removeEllipsis: z.boolean().default(false),
      correctOverlaps: z.boolean().default(true),
      mergeLines: z.enum(['none', 'sentences', 'length', 'auto']).default('none'),
      mergeGap: z.number().nonnegative().default(0.5),
      mergeMaxChars: z.number().int().positive().default(80),
      mergeMinWords: z.number().int().nonnegative().default(10),
      strictChecks: z.array(z.enum(['empty', 'passthrough', 'script'])).default(['empty']),
      targetScript: z
        .string()
        .refine(isKnownScript, { message: 'not a Unicode script name (e.g. Han, Cyrillic, Latin)' })
        .optional(),
      onCueFailure: z.enum(['source', 'abort']).default('source'),
      maxConcurrent: z.number().int().positive().default(10),
    })
    .default({}),
  synthesis: z
    .object({
      voice: z.string().min(1).default('alloy'),
      model: z.string().min(1).default('tts-1'),
      speed: z.number().min(0.25).max(4).optional(),
      transcriptionModel: z.string().min(1).default('whisper-1'),
      similarityThreshold: z.number().min(0).max(1).default(0.75),
      groupMaxChars: z.number().int().nonnegative().default(0),
      strictSync: z.boolean().default(false),
      maxConcurrent: z.number().int().positive().default(4),
    })
    .default({}),
  retry: z
    .object({
      attempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().nonnegative().default(1000),
    })
    .default({}),
  rateLimits: z
    .object({
      translation: rateSchema.default({ requests: 5, windowMs: 1000 }),
      synthesis: rateSchema.default({ requests: 3, windowMs: 10_000 }),
    })
    .default({}),
  timeline: z
    .object({
      maxDrift: z.number().nonnegative().default(2),
    })
    .default({}),
  output: z
    .object({
      dir: z.string().optional(),
      addTrack: z.boolean().default(true),
      addSubtitles: z.boolean().default(true),
      trackTitle: z.string().optional(),
      /** Split translated lines longer than this for display; 0 keeps them whole. */
      splitMaxChars: z.number().int().nonnegative().default(0),
      splitMinTail: z.number().int().nonnegative().default(10),
    })
    .default({}),
  fileConcurrency: z.number().int().positive().default(2),
})

export type DubbingSettings = z.infer<typeof settingsSchema>

type Env = Record<string, string | undefined>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge of plain objects; undefined leaves in `top` never replace values in `base`. */
export function mergeInput(base: Record<string, unknown>, top: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(top)) {
    if (value === undefined) continue
    const previous = out[key]
    out[key] = isRecord(value) ? mergeInput(isRecord(previous) ? previous : {}, value) : value
  }
  return out
}

function num(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const n = Number(value)
  return Number.isFinite(n) ? n : undefined
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return /^(1|true|yes|on)$/i.test(value.trim())
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function str(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}

/** Settings input from environment variables; unset variables are left out. */
export function settingsFromEnv(env: Env): Record<string, unknown> {
  return mergeInput(
    {},
    {
      translate: bool(env.DUB_TRANSLATE),
      synthesize: bool(env.DUB_SYNTHESIZE),
      openai: {
        apiKey: str(env.OPENAI_API_KEY),
        baseUrl: str(env.OPENAI_BASE_URL),
      },
      translation: {
        targetLanguage: str(env.DUB_TARGET_LANGUAGE),
        model: str(env.DUB_LLM_MODEL),
        mode: str(env.DUB_TRANSLATION_MODE),
        batchSize: num(env.DUB_BATCH_SIZE),
        maxChars: num(env.DUB_BATCH_MAX_CHARS),
        sectionGap: num(env.DUB_SECTION_GAP),
        removeEllipsis: bool(env.DUB_REMOVE_ELLIPSIS),
        correctOverlaps: bool(env.DUB_CORRECT_OVERLAPS),
        mergeLines: str(env.DUB_MERGE_LINES),
        mergeGap: num(env.DUB_MERGE_GAP),
        mergeMaxChars: num(env.DUB_MERGE_MAX_CHARS),
        mergeMinWords: num(env.DUB_MERGE_MIN_WORDS),
        strictChecks: list(env.DUB_STRICT_CHECKS),
        targetScript: str(env.DUB_TARGET_SCRIPT),
        onCueFailure: str(env.DUB_ON_CUE_FAILURE),
        maxConcurrent: num(env.DUB_TRANSLATION_CONCURRENCY),
      },
      synthesis: {
        voice: str(env.DUB_VOICE),
        model: str(env.DUB_TTS_MODEL),
        speed: num(env.DUB_TTS_SPEED),
        transcriptionModel: str(env.DUB_TRANSCRIPTION_MODEL),
        similarityThreshold: num(env.DUB_SIMILARITY_THRESHOLD),
        groupMaxChars: num(env.DUB_TTS_GROUP_MAX_CHARS),
        strictSync: bool(env.DUB_STRICT_SYNC),
        maxConcurrent: num(env.DUB_SYNTHESIS_CONCURRENCY),
      },
      retry: {
        attempts: num(env.DUB_RETRY_ATTEMPTS),
        baseDelayMs: num(env.DUB_RETRY_BASE_DELAY_MS),
      },
      rateLimits: {
        translation: rateFromEnv(env.DUB_TRANSLATION_RATE, env.DUB_TRANSLATION_WINDOW_MS, 1000),
        synthesis: rateFromEnv(env.DUB_SYNTHESIS_RATE, env.DUB_SYNTHESIS_WINDOW_MS, 10_000),
      },
      timeline: {
        maxDrift: num(env.DUB_MAX_DRIFT),
      },
      output: {
        dir: str(env.DUB_OUTPUT_DIR),
        addTrack: bool(env.DUB_ADD_TRACK),
        addSubtitles: bool(env.DUB_ADD_SUBTITLES),
        trackTitle: str(env.DUB_TRACK_TITLE),
        splitMaxChars: num(env.DUB_SPLIT_MAX_CHARS),
        splitMinTail: num(env.DUB_SPLIT_MIN_TAIL),
      },
      fileConcurrency: num(env.DUB_FILE_CONCURRENCY),
    }
  )
}

function rateFromEnv(requests: string | undefined, windowMs: string | undefined, defaultWindow: number) {
  const r = num(requests)
  if (r === undefined) return undefined
  return { requests: r, windowMs: num(windowMs) ?? defaultWindow }
}

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`cannot read config file ${file}: ${errorMessage(err)}`)
  }
  if (!isRecord(parsed)) throw new ConfigError(`config file ${file} must contain a JSON object`)
  return parsed
}

function deepFreeze<T>(value: T): T {
  if (isRecord(value) || Array.isArray(value)) {
    Object.values(value).forEach(deepFreeze)
    Object.freeze(value)
  }
  return value
}

export interface LoadSettingsOptions {
  env?: Env
  /** JSON file; defaults to DUB_CONFIG from env. */
  file?: string
  overrides?: Record<string, unknown>
}

export function loadSettings(options: LoadSettingsOptions = {}): Readonly<DubbingSettings> {
  const env = options.env ?? process.env
  let input = settingsFromEnv(env)
  const file = options.file ?? str(env.DUB_CONFIG)
  if (file) input = mergeInput(input, readConfigFile(file))
  if (options.overrides) input = mergeInput(input, options.overrides)

  const result = settingsSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`invalid settings: ${issues.join('; ')}`)
  }
  const settings = result.data
  if (settings.translation.strictChecks.includes('script') && !settings.translation.targetScript) {
    throw new ConfigError('translation.strictChecks includes "script" but translation.targetScript is not set')
  }
  return deepFreeze(settings)
}

/** Response checks selected by the settings. */
export function buildChecks(settings: Pick<DubbingSettings, 'translation'>): ResponseCheck[] {
  const { strictChecks, targetScript } = settings.translation
  const checks: ResponseCheck[] = []
  if (strictChecks.includes('empty')) checks.push(rejectEmpty)
  if (strictChecks.includes('passthrough')) checks.push(rejectPassthrough)
  if (strictChecks.includes('script') && targetScript) checks.push(requireScript(targetScript))
  return checks
}
