import { describe, expect, it, vi } from 'vitest'
import { assembleTimeline } from '../timeline'
import type { AudioSegment } from '../synthesis'
import { CueSetError } from '../../lib/errors'
import { silentLogger } from '../../lib/logger'
import { framesOf } from '../../utils/pcm'
import { TEST_FORMAT, cueSetOf, tone } from '../../__tests__/helpers'

function clip(cueIndex: number, seconds: number): AudioSegment {
  const samples = tone(seconds * TEST_FORMAT.sampleRate)
  return { cueIndex, samples, duration: seconds, similarity: 1, recovered: false, desynced: false }
}

function isSilent(samples: Buffer, fromFrame: number, toFrame: number): boolean {
  for (let f = fromFrame; f < toFrame; f++) {
    if (samples.readInt16LE(f * 2) !== 0) return false
  }
  return true
}

const options = { format: TEST_FORMAT, maxDrift: 2 }

describe('assembleTimeline', () => {
  it('places each clip at its cue start with silence between', () => {
    const cueSet = cueSetOf([
      [0, 4, 'a'],
      [5, 9, 'b'],
      [10, 14, 'c'],
    ])
    const track = assembleTimeline(cueSet, [clip(1, 2), clip(2, 2), clip(3, 2)], options)

    expect(track.duration).toBe(14)
    expect(framesOf(track.samples)).toBe(14_000)
    expect(track.placements.map((p) => [p.offset, p.duration, p.drift])).toEqual([
      [0, 2, 0],
      [5, 2, 0],
      [10, 2, 0],
    ])
    expect(track.samples.readInt16LE(0)).toBe(100)
    expect(isSilent(track.samples, 2000, 5000)).toBe(true)
    expect(track.samples.readInt16LE(5000 * 2)).toBe(100)
    expect(isSilent(track.samples, 7000, 10_000)).toBe(true)
    expect(isSilent(track.samples, 12_000, 14_000)).toBe(true)
  })

  it('pushes a clip back when the previous one overruns, recording the drift', () => {
    const cueSet = cueSetOf([
      [0, 1, 'a'],
      [1, 2, 'b'],
    ])
    const track = assembleTimeline(cueSet, [clip(1, 1.5), clip(2, 1.5)], options)
    expect(track.placements.map((p) => [p.offset, p.drift])).toEqual([
      [0, 0],
      [1.5, 0.5],
    ])
    expect(track.duration).toBe(3)
  })

  it('warns only when drift exceeds the limit', () => {
    const cueSet = () =>
      cueSetOf([
        [0, 1, 'a'],
        [1, 2, 'b'],
      ])
    const clips = [clip(1, 1.5), clip(2, 1.5)]

    const calm = silentLogger()
    const calmWarn = vi.spyOn(calm, 'warn')
    assembleTimeline(cueSet(), clips, { ...options, maxDrift: 0.5, logger: calm })
    expect(calmWarn).not.toHaveBeenCalled()

    const strict = silentLogger()
    const strictWarn = vi.spyOn(strict, 'warn')
    assembleTimeline(cueSet(), clips, { ...options, maxDrift: 0.25, logger: strict })
    expect(strictWarn).toHaveBeenCalledTimes(1)
    expect(strictWarn).toHaveBeenCalledWith({ cue: 2, drift: 0.5, maxDrift: 0.25 }, 'accumulated drift above limit')
  })

  it('pads to the video length and leaves cues without audio silent', () => {
    const cueSet = cueSetOf([
      [0, 1, 'a'],
      [2, 3, 'b'],
    ])
    const track = assembleTimeline(cueSet, [clip(2, 1)], { ...options, videoDuration: 20 })
    expect(track.duration).toBe(20)
    expect(track.placements.map((p) => p.cueIndex)).toEqual([2])
    expect(isSilent(track.samples, 0, 2000)).toBe(true)
  })

  it('rejects segments for unknown or repeated cues', () => {
    const cueSet = cueSetOf([[0, 1, 'a']])
    expect(() => assembleTimeline(cueSet, [clip(5, 1)], options)).toThrow(CueSetError)
    expect(() => assembleTimeline(cueSet, [clip(1, 1), clip(1, 1)], options)).toThrow('two audio segments for cue 1')
  })
})
