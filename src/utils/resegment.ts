/**
 * Re-segmentation of parsed cues before they become a CueSet: sorting, overlap correction and merging of
 * fragments into sentences or longer lines. Splitting long translated lines is done on output only, so
 * cue indices stay fixed once translation starts.
 */
import type { CueInput } from '../models/cue'
import type { Logger } from '../lib/logger'
import { silentLogger } from '../lib/logger'

const SENTENCE_END = '。！？.!?'

export type MergeStrategy = 'none' | 'sentences' | 'length' | 'auto'

export interface ResegmentOptions {
  correctOverlaps: boolean
  merge: MergeStrategy
  /** Largest gap in seconds across which cues are joined. */
  gap: number
  /** `length`: joined text stays under this many characters. */
  maxChars: number
  /** `sentences`: cues shorter than this many words are always joined to the one before. */
  minWords: number
}

/** Share of sentence-final cues above which `auto` merges by sentence. */
const SENTENCE_RATIO = 0.8

const UNSPACED = /[\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}]/u
const HYBRID_UNITS = /[\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}]|(?:(?![\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}])[\p{L}\p{N}\p{M}\p{S}_'-])+/gu

/** Length in words, counting each Han or Kana character as one word. */
export function wordLength(text: string): number {
  return text.match(HYBRID_UNITS)?.length ?? 0
}

function renumber(cues: readonly CueInput[]): CueInput[] {
  return cues.map((cue, i) => ({ ...cue, index: i + 1 }))
}

function endsSentence(text: string): boolean {
  const trimmed = text.trimEnd()
  return trimmed.length > 0 && SENTENCE_END.includes(trimmed[trimmed.length - 1])
}

/** True when cue numbers repeat or start times go backwards. */
export function needsSorting(cues: readonly CueInput[]): boolean {
  const seen = new Set<number>()
  let previousStart = -Infinity
  for (const cue of cues) {
    if (seen.has(cue.index) || cue.start < previousStart) return true
    seen.add(cue.index)
    previousStart = cue.start
  }
  return false
}

/** Stable sort by start time, numbered from 1. */
export function sortCues(cues: readonly CueInput[]): CueInput[] {
  return renumber([...cues].sort((a, b) => a.start - b.start))
}

/**
 * Ends each cue no later than the next one starts. Two cues starting together become one.
 * Expects cues sorted by start.
 */
export function correctOverlaps(cues: readonly CueInput[]): CueInput[] {
  const out: CueInput[] = []
  for (const cue of cues) {
    const last = out[out.length - 1]
    if (!last || last.end <= cue.start) {
      out.push({ ...cue })
    } else if (last.start < cue.start) {
      out[out.length - 1] = { ...last, end: cue.start }
      out.push({ ...cue })
    } else {
      out[out.length - 1] = { ...last, end: Math.max(last.end, cue.end), sourceText: `${last.sourceText}\n${cue.sourceText}` }
    }
  }
  return out.length === cues.length ? out : renumber(out)
}

/** Share of cues whose text ends with sentence punctuation. */
export function sentenceRatio(cues: readonly CueInput[]): number {
  if (cues.length === 0) return 0
  return cues.filter((cue) => endsSentence(cue.sourceText)).length / cues.length
}

function join(last: CueInput, cue: CueInput): CueInput {
  return { ...last, end: Math.max(last.end, cue.end), sourceText: `${last.sourceText} ${cue.sourceText}` }
}

/**
 * Joins a cue to the one before when that one has not finished its sentence and the gap is short, or when
 * the cue is shorter than `minWords`. Times are only widened, never moved.
 */
export function mergeSentences(cues: readonly CueInput[], options: Pick<ResegmentOptions, 'gap' | 'minWords'>): CueInput[] {
  const out: CueInput[] = []
  for (const cue of cues) {
    const last = out[out.length - 1]
    const unfinished = last !== undefined && !endsSentence(last.sourceText) && cue.start - last.end < options.gap
    if (last && (unfinished || wordLength(cue.sourceText) < options.minWords)) {
      out[out.length - 1] = join(last, cue)
    } else {
      out.push({ ...cue })
    }
  }
  return renumber(out)
}

/** Joins neighbours closer than `gap` while the joined text stays under `maxChars`. */
export function mergeByLength(cues: readonly CueInput[], options: Pick<ResegmentOptions, 'gap' | 'maxChars'>): CueInput[] {
  const out: CueInput[] = []
  for (const cue of cues) {
    const last = out[out.length - 1]
    if (last && cue.start - last.end < options.gap && last.sourceText.length + cue.sourceText.length < options.maxChars) {
      out[out.length - 1] = join(last, cue)
    } else {
      out.push({ ...cue })
    }
  }
  return renumber(out)
}

export interface SplitOptions {
  maxChars: number
  /** A remainder shorter than this stays on the line before it. */
  minTail: number
}

function splitText(text: string, { maxChars, minTail }: SplitOptions): string[] {
  // break after whole words in spaced text, anywhere in Han or Kana text
  const spaced = /[^\S\n]/.test(text.trim()) || !UNSPACED.test(text)
  const separator = spaced ? ' ' : ''
  let rest = text.replace(/\s*\n\s*/g, separator)
  const pieces: string[] = []
  while (rest.length > maxChars) {
    const cut = separator ? rest.indexOf(separator, maxChars) : maxChars
    if (cut === -1) break
    const tail = rest.slice(cut + separator.length)
    if (tail.length === 0 || tail.length < minTail) break
    pieces.push(rest.slice(0, cut))
    rest = tail
  }
  pieces.push(rest)
  return pieces
}

/**
 * Splits cues whose text is longer than `maxChars` into consecutive cues, sharing the time span by text
 * length. Output is numbered from 1.
 */
export function splitByLength(cues: readonly CueInput[], options: SplitOptions): CueInput[] {
  const out: CueInput[] = []
  for (const cue of cues) {
    if (cue.sourceText.length <= options.maxChars) {
      out.push({ ...cue })
      continue
    }
    const pieces = splitText(cue.sourceText, options)
    const total = pieces.reduce((sum, piece) => sum + piece.length, 0)
    let consumed = 0
    pieces.forEach((piece, i) => {
      const start = cue.start + ((cue.end - cue.start) * consumed) / total
      consumed += piece.length
      const end = i === pieces.length - 1 ? cue.end : cue.start + ((cue.end - cue.start) * consumed) / total
      out.push({ index: cue.index, start, end, sourceText: piece })
    })
  }
  return renumber(out)
}

/** Applies overlap correction and the merge strategy to freshly parsed, sorted cues. */
export function resegment(cues: readonly CueInput[], options: ResegmentOptions, logger: Logger = silentLogger()): CueInput[] {
  let out = options.correctOverlaps ? correctOverlaps(cues) : [...cues]
  let strategy = options.merge
  if (strategy === 'auto') {
    strategy = sentenceRatio(out) > SENTENCE_RATIO ? 'sentences' : 'length'
  }
  if (strategy === 'sentences') out = mergeSentences(out, options)
  if (strategy === 'length') out = mergeByLength(out, options)
  if (out.length !== cues.length) {
    logger.info({ from: cues.length, to: out.length, strategy }, 'subtitle lines re-segmented')
  }
  return out
}
