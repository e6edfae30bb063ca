import { CueSet } from '../models/cue'
import type { Cue, CueInput } from '../models/cue'
import { CueSetError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { silentLogger } from '../lib/logger'
import { detectSubtitleFormat } from './subtitleDetector'
import { needsSorting, sortCues } from './resegment'

const TIME_RANGE = /(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})/
// WebVTT allows the hours to be left out
const VTT_TIME_RANGE = /(?:(\d+):)?(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(?:(\d+):)?(\d{2}):(\d{2})[,.](\d{3})/

/** Which text of a cue to write out. */
export type TextSource = 'source' | 'translated' | 'bilingual'

function toSeconds(h: string | undefined, m: string, s: string, ms: string): number {
  return (h ? parseInt(h, 10) : 0) * 3600 + parseInt(m, 10) * 60 + parseInt(s, 10) + parseInt(ms, 10) / 1000
}

function normalizeNewlines(content: string): string {
  return content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n')
}

/**
 * Parse SRT content. Blocks without a numeric index, a time range or a positive duration are skipped.
 */
export function parseSRT(content: string): CueInput[] {
  const cues: CueInput[] = []
  const blocks = normalizeNewlines(content).trim().split(/\n\s*\n/)

  for (const block of blocks) {
    const lines = block.trim().split('\n')
    if (lines.length < 3) continue

    const index = parseInt(lines[0], 10)
    if (isNaN(index)) continue

    const m = lines[1].match(TIME_RANGE)
    if (!m) continue
    const start = toSeconds(m[1], m[2], m[3], m[4])
    const end = toSeconds(m[5], m[6], m[7], m[8])
    if (end <= start) continue

    const sourceText = lines.slice(2).map((l) => l.trim()).join('\n').trim()
    if (!sourceText) continue
    cues.push({ index, start, end, sourceText })
  }

  return cues
}

/**
 * Parse WebVTT content. Cue identifiers are ignored; cues are numbered from 1 in file order.
 */
export function parseVTT(content: string): CueInput[] {
  const cues: CueInput[] = []
  const lines = normalizeNewlines(content).split('\n')
  let index = 1
  let i = 0

  while (i < lines.length) {
    const m = lines[i].match(VTT_TIME_RANGE)
    if (!m) {
      i++
      continue
    }
    i++
    const textLines: string[] = []
    while (i < lines.length && lines[i].trim() !== '' && !VTT_TIME_RANGE.test(lines[i])) {
      textLines.push(lines[i].trim())
      i++
    }
    const start = toSeconds(m[1], m[2], m[3], m[4])
    const end = toSeconds(m[5], m[6], m[7], m[8])
    if (textLines.length > 0 && end > start) {
      cues.push({ index: index++, start, end, sourceText: textLines.join('\n') })
    }
  }

  return cues
}

/**
 * Parse SRT or VTT content, detecting the format from the content. Cues out of time order or with repeated
 * numbers are sorted by start time and numbered from 1.
 */
export function parseCues(content: string, logger: Logger = silentLogger()): CueInput[] {
  const format = detectSubtitleFormat(content)
  if (format === 'unknown') {
    throw new CueSetError('unrecognized subtitle format (expected SRT or WebVTT)')
  }
  const cues = format === 'vtt' ? parseVTT(content) : parseSRT(content)
  if (cues.length === 0) {
    throw new CueSetError('subtitle file contains no cues')
  }
  if (needsSorting(cues)) {
    logger.warn({ cues: cues.length }, 'cues out of order or numbered twice; sorted by start time and renumbered')
    return sortCues(cues)
  }
  return cues
}

export function parseSubtitles(content: string, logger?: Logger): CueSet {
  return new CueSet(parseCues(content, logger))
}

function cueText(cue: Cue, source: TextSource): string {
  switch (source) {
    case 'source':
      return cue.sourceText
    case 'translated':
      return cue.translatedText || cue.sourceText
    case 'bilingual':
      return cue.translatedText ? `${cue.translatedText}\n${cue.sourceText}` : cue.sourceText
  }
}

/**
 * Convert cues to SRT. Consecutive blocks are separated by one blank line.
 */
export function toSRT(cues: Iterable<Cue>, source: TextSource = 'translated'): string {
  const blocks: string[] = []
  for (const cue of cues) {
    blocks.push(`${cue.index}\n${formatTimestamp(cue.start, ',')} --> ${formatTimestamp(cue.end, ',')}\n${cueText(cue, source)}\n`)
  }
  return blocks.join('\n')
}

export function toVTT(cues: Iterable<Cue>, source: TextSource = 'translated'): string {
  const blocks: string[] = []
  for (const cue of cues) {
    blocks.push(`${formatTimestamp(cue.start, '.')} --> ${formatTimestamp(cue.end, '.')}\n${cueText(cue, source)}\n`)
  }
  return 'WEBVTT\n\n' + blocks.join('\n')
}

/** HH:MM:SS<sep>mmm, rounded to the nearest millisecond. */
export function formatTimestamp(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const hours = Math.floor(totalMs / 3_600_000)
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000)
  const secs = Math.floor((totalMs % 60_000) / 1000)
  const millis = totalMs % 1000
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}${separator}${String(millis).padStart(3, '0')}`
}
