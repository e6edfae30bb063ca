/**
 * One subtitle file (and optionally its video) through the whole pipeline:
 * parse, translate, write subtitles, synthesize, assemble the track, mux.
 * Each file owns an AbortController; the first fatal error cancels the rest of that file's work.
 */
import fs from 'fs'
import path from 'path'
import pLimit from 'p-limit'
import type { DubbingSettings } from '../config'
import { buildChecks } from '../config'
import type { Logger } from '../lib/logger'
import { redactFilePath, silentLogger } from '../lib/logger'
import { captureFileError } from '../lib/sentry'
import { CancelledError, DubbingError, errorMessage } from '../lib/errors'
import { CueSet } from '../models/cue'
import type { RateLimiter } from '../utils/rateLimiter'
import { parseCues, toSRT } from '../utils/srtParser'
import { resegment, splitByLength } from '../utils/resegment'
import type { ResegmentOptions } from '../utils/resegment'
import { encodeWav } from '../utils/pcm'
import { Translator } from './translation'
import type { TranslationService, TranslatorOptions } from './translation'
import { Synthesizer } from './synthesis'
import type { SynthesizerOptions, VoiceService } from './synthesis'
import { assembleTimeline } from './timeline'

export interface DubbingTask {
  subtitlePath: string
  videoPath?: string
  /** Defaults to settings.output.dir, then the subtitle file's directory. */
  outputDir?: string
}

export interface MediaInfo {
  /** Seconds; 0 when the container does not report one. */
  duration: number
  audioStreams: number
}

export interface AddTrackRequest {
  videoPath: string
  audioPath: string
  subtitlePaths: string[]
  outputPath: string
  /** Number of audio streams already in the video; the dubbed track is added after them. */
  originalAudioStreams: number
  title?: string
}

export interface Muxer {
  probe(filePath: string): Promise<MediaInfo>
  addAudioTrack(request: AddTrackRequest): Promise<string>
}

export type DubbingStage = 'parsed' | 'translated' | 'synthesized' | 'assembled' | 'muxed'

const STAGE_PROGRESS: Record<DubbingStage, number> = {
  parsed: 5,
  translated: 40,
  synthesized: 80,
  assembled: 90,
  muxed: 100,
}

export interface DubbingDeps {
  settings: Readonly<DubbingSettings>
  /** Shared by every file in the process. */
  limiter: RateLimiter
  translationService: TranslationService
  voiceService: VoiceService
  muxer: Muxer
  logger?: Logger
  onProgress?: (stage: DubbingStage, percent: number) => void | Promise<void>
  jobId?: string | number
}

export interface FileOutputs {
  translatedSubtitles?: string
  bilingualSubtitles?: string
  audio?: string
  video?: string
}

export interface FileSummary {
  cues: number
  translationRequests: number
  /** Cues that kept their source text after failing translation on their own. */
  untranslatedCues: number[]
  synthesisRequests: number
  desyncedCues: number[]
  /** Length of the dubbed track in seconds. */
  duration?: number
}

export interface FileResult {
  file: string
  status: 'succeeded' | 'failed'
  error?: { code: string; message: string }
  outputs: FileOutputs
  summary?: FileSummary
}

export function translatorOptions(settings: Readonly<DubbingSettings>): TranslatorOptions {
  const t = settings.translation
  return {
    targetLanguage: t.targetLanguage,
    mode: t.mode,
    batch: { maxLines: t.batchSize, maxChars: t.maxChars, sectionGap: t.sectionGap },
    retry: settings.retry,
    checks: buildChecks(settings),
    removeEllipsis: t.removeEllipsis,
    onCueFailure: t.onCueFailure,
    maxConcurrent: t.maxConcurrent,
  }
}

export function synthesizerOptions(settings: Readonly<DubbingSettings>): SynthesizerOptions {
  const s = settings.synthesis
  return {
    voice: { voice: s.voice, model: s.model, speed: s.speed },
    similarityThreshold: s.similarityThreshold,
    groupMaxChars: s.groupMaxChars,
    strictSync: s.strictSync,
    retry: settings.retry,
    maxConcurrent: s.maxConcurrent,
  }
}

export function resegmentOptions(settings: Readonly<DubbingSettings>): ResegmentOptions {
  const t = settings.translation
  return {
    correctOverlaps: t.correctOverlaps,
    merge: t.mergeLines,
    gap: t.mergeGap,
    maxChars: t.mergeMaxChars,
    minWords: t.mergeMinWords,
  }
}

/** Translated text as SRT, with long lines split into shorter timed lines when `output.splitMaxChars` is set. */
export function translatedSRT(cueSet: CueSet, settings: Readonly<DubbingSettings>): string {
  const { splitMaxChars, splitMinTail } = settings.output
  if (splitMaxChars === 0) return toSRT(cueSet, 'translated')
  const lines = cueSet.toArray().map((cue) => ({
    index: cue.index,
    start: cue.start,
    end: cue.end,
    sourceText: cue.translatedText || cue.sourceText,
  }))
  return toSRT(new CueSet(splitByLength(lines, { maxChars: splitMaxChars, minTail: splitMinTail })), 'source')
}

/** "Simplified Chinese" -> "simplified-chinese", for file names. */
export function languageTag(language: string): string {
  const tag = language
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '')
  return tag || 'dub'
}

function baseName(file: string): string {
  return path.basename(file, path.extname(file))
}

async function runPipeline(
  task: DubbingTask,
  deps: DubbingDeps,
  outputs: FileOutputs,
  summary: FileSummary,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  const { settings } = deps
  const progress = async (stage: DubbingStage) => {
    logger.debug({ stage }, 'stage done')
    await deps.onProgress?.(stage, STAGE_PROGRESS[stage])
  }

  const content = await fs.promises.readFile(task.subtitlePath, 'utf-8')
  const cueSet = new CueSet(resegment(parseCues(content, logger), resegmentOptions(settings), logger))
  summary.cues = cueSet.size
  await progress('parsed')

  if (settings.translate) {
    const translator = new Translator(deps.translationService, deps.limiter, translatorOptions(settings), logger)
    const report = await translator.translate(cueSet, { signal })
    summary.translationRequests = report.requests
    summary.untranslatedCues = report.failedCues.map((f) => f.index)
  } else {
    for (const cue of cueSet) cueSet.setTranslation(cue.index, cue.sourceText)
  }
  await progress('translated')

  const outputDir = task.outputDir ?? settings.output.dir ?? path.dirname(task.subtitlePath)
  await fs.promises.mkdir(outputDir, { recursive: true })
  const name = baseName(task.subtitlePath)

  outputs.translatedSubtitles = path.join(outputDir, `${name}.${languageTag(settings.translation.targetLanguage)}.srt`)
  await fs.promises.writeFile(outputs.translatedSubtitles, translatedSRT(cueSet, settings), 'utf-8')
  if (settings.translate) {
    outputs.bilingualSubtitles = path.join(outputDir, `${name}.bilingual.srt`)
    await fs.promises.writeFile(outputs.bilingualSubtitles, toSRT(cueSet, 'bilingual'), 'utf-8')
  }

  if (!settings.synthesize) return

  const synthesizer = new Synthesizer(deps.voiceService, deps.limiter, synthesizerOptions(settings), logger)
  const synthesis = await synthesizer.synthesize(cueSet, { signal })
  summary.synthesisRequests = synthesis.requests
  summary.desyncedCues = synthesis.desynced
  await progress('synthesized')

  const media = task.videoPath ? await deps.muxer.probe(task.videoPath) : undefined
  const track = assembleTimeline(cueSet, synthesis.segments, {
    format: deps.voiceService.format,
    maxDrift: settings.timeline.maxDrift,
    videoDuration: media?.duration,
    logger,
  })
  summary.duration = track.duration
  outputs.audio = path.join(outputDir, `${name}.dub.wav`)
  await fs.promises.writeFile(outputs.audio, encodeWav(track.samples, track.format))
  await progress('assembled')

  if (!task.videoPath || !media || !settings.output.addTrack) return
  const videoOut = path.join(outputDir, `${name}.dub${path.extname(task.videoPath) || '.mp4'}`)
  outputs.video = await deps.muxer.addAudioTrack({
    videoPath: task.videoPath,
    audioPath: outputs.audio,
    subtitlePaths: settings.output.addSubtitles ? [outputs.translatedSubtitles] : [],
    outputPath: videoOut,
    originalAudioStreams: media.audioStreams,
    title: settings.output.trackTitle ?? settings.translation.targetLanguage,
  })
  await progress('muxed')
}

/** Runs one file end to end. Never throws: failures come back as a failed FileResult. */
export async function dubFile(task: DubbingTask, deps: DubbingDeps): Promise<FileResult> {
  const logger = deps.logger ?? silentLogger()
  const controller = new AbortController()
  const outputs: FileOutputs = {}
  const summary: FileSummary = {
    cues: 0,
    translationRequests: 0,
    untranslatedCues: [],
    synthesisRequests: 0,
    desyncedCues: [],
  }
  const started = Date.now()
  logger.info({ video: task.videoPath ? redactFilePath(task.videoPath) : undefined }, 'dubbing started')

  try {
    await runPipeline(task, deps, outputs, summary, controller.signal, logger)
  } catch (err) {
    controller.abort()
    const code = err instanceof DubbingError ? err.code : 'INTERNAL'
    if (!(err instanceof CancelledError)) {
      captureFileError(task.subtitlePath, err, deps.jobId)
    }
    logger.error({ err, code, ms: Date.now() - started }, 'dubbing failed')
    return {
      file: task.subtitlePath,
      status: 'failed',
      error: { code, message: errorMessage(err) },
      outputs,
      summary,
    }
  }

  logger.info({ ms: Date.now() - started, ...summary }, 'dubbing finished')
  return { file: task.subtitlePath, status: 'succeeded', outputs, summary }
}

/**
 * Runs several files, `fileConcurrency` at a time. One file failing does not stop the others.
 * Results are in task order.
 */
export async function runBatch(tasks: readonly DubbingTask[], deps: DubbingDeps): Promise<FileResult[]> {
  const logger = deps.logger ?? silentLogger()
  const limit = pLimit(deps.settings.fileConcurrency)
  const results = await Promise.all(
    tasks.map((task) =>
      limit(() => dubFile(task, { ...deps, logger: logger.child({ file: redactFilePath(task.subtitlePath) }) }))
    )
  )
  const failed = results.filter((r) => r.status === 'failed').length
  logger.info({ files: results.length, failed }, 'batch finished')
  return results
}
