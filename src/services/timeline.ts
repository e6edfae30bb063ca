import type { CueSet } from '../models/cue'
import type { Logger } from '../lib/logger'
import { silentLogger } from '../lib/logger'
import { CueSetError } from '../lib/errors'
import { BYTES_PER_FRAME, framesOf, secondsToFrames, silence } from '../utils/pcm'
import type { PcmFormat } from '../utils/pcm'
import type { AudioSegment } from './synthesis'

export interface Placement {
  cueIndex: number
  /** Where the clip starts in the track, in seconds. */
  offset: number
  duration: number
  /** How far past the cue's start the clip had to be pushed by earlier overruns. */
  drift: number
}

export interface MasterTrack {
  samples: Buffer
  duration: number
  format: PcmFormat
  placements: Placement[]
}

export interface AssembleOptions {
  format: PcmFormat
  /** Drift in seconds above which a warning is logged. */
  maxDrift: number
  /** Pad the track to the video's length when it runs past the last cue. */
  videoDuration?: number
  logger?: Logger
}

/**
 * Places each cue's clip at its start time, filling gaps with silence. A clip that overruns its window
 * pushes the next ones later instead of being cut.
 */
export function assembleTimeline(cueSet: CueSet, segments: readonly AudioSegment[], options: AssembleOptions): MasterTrack {
  const { format, maxDrift } = options
  const logger = options.logger ?? silentLogger()
  const byIndex = new Map<number, AudioSegment>()
  for (const segment of segments) {
    cueSet.get(segment.cueIndex)
    if (byIndex.has(segment.cueIndex)) {
      throw new CueSetError(`two audio segments for cue ${segment.cueIndex}`)
    }
    byIndex.set(segment.cueIndex, segment)
  }

  const chunks: Buffer[] = []
  const placements: Placement[] = []
  let cursor = 0
  let maxSeen = 0

  for (const cue of cueSet) {
    const segment = byIndex.get(cue.index)
    if (!segment) continue
    const startFrame = secondsToFrames(cue.start, format)
    let drift = 0
    if (cursor < startFrame) {
      chunks.push(silence(startFrame - cursor))
      cursor = startFrame
    } else if (cursor > startFrame) {
      drift = (cursor - startFrame) / format.sampleRate
      logger.debug({ cue: cue.index, drift }, 'clip placed after its start')
      if (drift > maxDrift) {
        logger.warn({ cue: cue.index, drift, maxDrift }, 'accumulated drift above limit')
      }
    }
    const frames = framesOf(segment.samples)
    chunks.push(segment.samples.subarray(0, frames * BYTES_PER_FRAME))
    placements.push({
      cueIndex: cue.index,
      offset: cursor / format.sampleRate,
      duration: frames / format.sampleRate,
      drift,
    })
    maxSeen = Math.max(maxSeen, drift)
    cursor += frames
  }

  const last = cueSet.at(cueSet.size - 1)
  const endFrame = secondsToFrames(Math.max(last?.end ?? 0, options.videoDuration ?? 0), format)
  if (cursor < endFrame) {
    chunks.push(silence(endFrame - cursor))
    cursor = endFrame
  }

  logger.info({ clips: placements.length, duration: cursor / format.sampleRate, maxDrift: maxSeen }, 'timeline assembled')
  return {
    samples: Buffer.concat(chunks),
    duration: cursor / format.sampleRate,
    format,
    placements,
  }
}
