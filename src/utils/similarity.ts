/**
 * Fuzzy text comparison used to check what a voice engine says it spoke against what it was asked to speak.
 * Engines drop punctuation and change spacing, so both sides are compared on letters and digits only.
 */
import { distance } from 'fastest-levenshtein'

export function normalizeForMatch(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '')
}

/** Edit-distance ratio in [0, 1]; 1 means identical after normalization. */
export function similarity(a: string, b: string): number {
  const left = normalizeForMatch(a)
  const right = normalizeForMatch(b)
  if (left.length === 0 && right.length === 0) return 1
  if (left.length === 0 || right.length === 0) return 0
  return 1 - distance(left, right) / Math.max(left.length, right.length)
}

export interface SpanMatch {
  /** First unit of the span. */
  start: number
  /** One past the last unit. */
  end: number
  score: number
}

function joinUnits(units: readonly string[], start: number, end: number): string {
  return units.slice(start, end).join(' ')
}

/**
 * Contiguous run of units (spoken segments or words) that best matches the target text.
 * Earliest and shortest span wins a tie. Undefined when there are no units.
 */
export function bestSpanMatch(units: readonly string[], target: string): SpanMatch | undefined {
  let best: SpanMatch | undefined
  const targetLength = normalizeForMatch(target).length
  for (let start = 0; start < units.length; start++) {
    let length = 0
    for (let end = start + 1; end <= units.length; end++) {
      length += normalizeForMatch(units[end - 1]).length
      const score = similarity(joinUnits(units, start, end), target)
      if (!best || score > best.score) best = { start, end, score }
      // past twice the target, longer spans only score lower
      if (length > 2 * targetLength) break
    }
  }
  return best
}

export interface SegmentGroup {
  start: number
  end: number
  score: number
}

/**
 * Partition the spoken units into one contiguous (possibly empty) group per target text, in order,
 * maximizing the summed similarity. Every unit is assigned to exactly one group.
 */
export function alignSegments(units: readonly string[], targets: readonly string[]): SegmentGroup[] {
  const n = targets.length
  const m = units.length
  if (n === 0) return []

  const unitLengths = units.map((u) => normalizeForMatch(u).length)
  const targetLengths = targets.map((t) => normalizeForMatch(t).length)
  // best[i][j]: highest total score placing units [0, j) onto targets [0, i)
  const best: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(-Infinity))
  const from: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0))
  best[0][0] = 0

  for (let i = 1; i <= n; i++) {
    const target = targets[i - 1]
    const cap = 2 * targetLengths[i - 1] + 20
    for (let j = 0; j <= m; j++) {
      // the last group takes whatever is left, however long
      const uncapped = i === n && j === m
      let length = 0
      for (let k = j; k >= 0; k--) {
        if (k < j) {
          length += unitLengths[k]
          if (!uncapped && k < j - 1 && length > cap) break
        }
        if (best[i - 1][k] === -Infinity) continue
        const score = best[i - 1][k] + similarity(joinUnits(units, k, j), target)
        if (score > best[i][j]) {
          best[i][j] = score
          from[i][j] = k
        }
      }
    }
  }

  const groups: SegmentGroup[] = new Array(n)
  let j = m
  for (let i = n; i >= 1; i--) {
    const k = from[i][j]
    groups[i - 1] = { start: k, end: j, score: similarity(joinUnits(units, k, j), targets[i - 1]) }
    j = k
  }
  return groups
}
