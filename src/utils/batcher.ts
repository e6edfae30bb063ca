import type { CueSet } from '../models/cue'

/** Indices of consecutive cues sent together as one translation request. */
export interface Batch {
  indices: number[]
}

export interface BatchLimits {
  maxLines: number
  /** Upper bound on the summed source text length of a batch. */
  maxChars?: number
  /** A pause longer than this many seconds between two cues also closes the batch. */
  sectionGap?: number
}

/**
 * Greedy, deterministic partition of the cue set into contiguous batches.
 * A cue that alone exceeds maxChars still becomes its own batch.
 */
export function createBatches(cueSet: CueSet, limits: BatchLimits): Batch[] {
  if (!Number.isInteger(limits.maxLines) || limits.maxLines < 1) {
    throw new RangeError(`maxLines must be a positive integer, got ${limits.maxLines}`)
  }
  const batches: Batch[] = []
  let current: number[] = []
  let chars = 0
  let previousEnd: number | undefined

  for (const cue of cueSet) {
    const length = cue.sourceText.length
    const overLines = current.length + 1 > limits.maxLines
    const overChars = limits.maxChars !== undefined && chars + length > limits.maxChars
    const pause =
      limits.sectionGap !== undefined && previousEnd !== undefined && cue.start - previousEnd > limits.sectionGap

    if (current.length > 0 && (overLines || overChars || pause)) {
      batches.push({ indices: current })
      current = []
      chars = 0
    }
    current.push(cue.index)
    chars += length
    previousEnd = cue.end
  }
  if (current.length > 0) batches.push({ indices: current })

  return batches
}

/** Split a batch in two halves for bisection; the first half takes the smaller share. */
export function bisect(batch: Batch): [Batch, Batch] {
  const mid = Math.floor(batch.indices.length / 2)
  return [{ indices: batch.indices.slice(0, mid) }, { indices: batch.indices.slice(mid) }]
}
