import { describe, expect, it } from 'vitest'
import { Synthesizer, groupCues, spokenWords } from '../synthesis'
import type { SpeechResult, SynthesizerOptions, VoiceService } from '../synthesis'
import { CancelledError, ConfigError, SynchronizationError } from '../../lib/errors'
import { framesOf } from '../../utils/pcm'
import { StubVoiceService, TEST_FORMAT, cueSetOf, fastLimiter, tone } from '../../__tests__/helpers'

function options(overrides: Partial<SynthesizerOptions> = {}): SynthesizerOptions {
  return {
    voice: { voice: 'alloy', model: 'tts-1' },
    similarityThreshold: 0.75,
    groupMaxChars: 0,
    strictSync: false,
    retry: { attempts: 2, baseDelayMs: 0 },
    maxConcurrent: 2,
    ...overrides,
  }
}

function translated(rows: Array<[number, number, string]>) {
  const cueSet = cueSetOf(rows)
  for (const cue of cueSet) cueSet.setTranslation(cue.index, cue.sourceText)
  return cueSet
}

describe('spokenWords', () => {
  it('keeps words and drops punctuation and spaces', () => {
    expect(spokenWords('Hello, world!')).toEqual(['Hello', 'world'])
  })
})

describe('groupCues', () => {
  it('joins consecutive cues up to the character limit', () => {
    const cues = translated([
      [0, 1, 'aaaa'],
      [1, 2, 'bbbb'],
      [2, 3, 'cccc'],
    ]).toArray()
    expect(groupCues(cues, 8).map((g) => g.map((c) => c.index))).toEqual([[1, 2], [3]])
    expect(groupCues(cues, 0)).toHaveLength(3)
  })
})

describe('Synthesizer', () => {
  it('produces one segment per voiced cue, in cue order', async () => {
    const service = new StubVoiceService()
    const cueSet = translated([
      [0, 1, 'Hola'],
      [2, 3, 'Adios'],
    ])
    const report = await new Synthesizer(service, fastLimiter(), options()).synthesize(cueSet)

    expect(report.requests).toBe(2)
    expect(report.segments.map((s) => [s.cueIndex, s.duration, s.similarity, s.desynced])).toEqual([
      [1, 0.4, 1, false],
      [2, 0.5, 1, false],
    ])
    expect(report.desynced).toEqual([])
  })

  it('skips cues without translated text', async () => {
    const service = new StubVoiceService()
    const cueSet = cueSetOf([
      [0, 1, 'one'],
      [1, 2, 'two'],
    ])
    cueSet.setTranslation(2, 'dos')
    const report = await new Synthesizer(service, fastLimiter(), options()).synthesize(cueSet)
    expect(service.requests).toEqual(['dos'])
    expect(report.segments.map((s) => s.cueIndex)).toEqual([2])
  })

  it('trims the audio to the part of the echo that matches the cue', async () => {
    const service = new StubVoiceService(() => ({
      audio: tone(1000),
      echoedText: 'um hello there uh',
      duration: 1,
      segments: [
        { text: 'um', start: 0, end: 0.2 },
        { text: 'hello there', start: 0.2, end: 0.8 },
        { text: 'uh', start: 0.8, end: 1 },
      ],
    }))
    const report = await new Synthesizer(service, fastLimiter(), options()).synthesize(translated([[0, 2, 'hello there']]))

    const [segment] = report.segments
    expect(framesOf(segment.samples)).toBe(600)
    expect(segment).toMatchObject({ cueIndex: 1, duration: 0.6, similarity: 1, recovered: true, desynced: false })
    expect(report.recovered).toEqual([1])
  })

  it('trims unspaced speech without segment timing to the matching words', async () => {
    const service = new StubVoiceService(() => ({
      audio: tone(900),
      echoedText: '你好吗我很好谢谢你',
      duration: 0.9,
      segments: [],
    }))
    const report = await new Synthesizer(service, fastLimiter(), options()).synthesize(translated([[0, 2, '你好吗']]))

    const [segment] = report.segments
    expect(framesOf(segment.samples)).toBe(300)
    expect(segment).toMatchObject({ cueIndex: 1, duration: 0.3, similarity: 1, recovered: true, desynced: false })
  })

  it('splits one merged request back onto its cues', async () => {
    const service = new StubVoiceService(
      (text): SpeechResult => ({
        audio: tone(3000),
        echoedText: text,
        duration: 3,
        segments: [
          { text: 'Good morning.', start: 0, end: 1 },
          { text: 'How are you?', start: 1, end: 2.2 },
          { text: 'Fine, thanks.', start: 2.2, end: 3 },
        ],
      })
    )
    const cueSet = translated([
      [0, 1, 'Good morning'],
      [1, 2, 'How are you'],
      [2, 3, 'Fine thanks'],
    ])
    const report = await new Synthesizer(service, fastLimiter(), options({ groupMaxChars: 100 })).synthesize(cueSet)

    expect(service.requests).toEqual(['Good morning\nHow are you\nFine thanks'])
    expect(report.requests).toBe(1)
    expect(report.segments.map((s) => [s.cueIndex, framesOf(s.samples), s.similarity])).toEqual([
      [1, 1000, 1],
      [2, 1200, 1],
      [3, 800, 1],
    ])
    expect(report.desynced).toEqual([])
  })

  const mumbling = () =>
    new StubVoiceService(() => ({ audio: tone(500), echoedText: 'something else entirely', duration: 0.5, segments: [] }))

  it('flags speech that cannot be matched and keeps going', async () => {
    const report = await new Synthesizer(mumbling(), fastLimiter(), options()).synthesize(translated([[0, 1, 'hello there']]))
    expect(report.desynced).toEqual([1])
    expect(report.segments[0].desynced).toBe(true)
  })

  it('fails on unmatched speech in strict mode', async () => {
    const synthesizer = new Synthesizer(mumbling(), fastLimiter(), options({ strictSync: true }))
    await expect(synthesizer.synthesize(translated([[0, 1, 'hello there']]))).rejects.toBeInstanceOf(
      SynchronizationError
    )
  })

  it('retries a failed request', async () => {
    let calls = 0
    const inner = new StubVoiceService()
    const flaky: VoiceService = {
      format: TEST_FORMAT,
      async synthesize(text, voice) {
        calls++
        if (calls === 1) throw new Error('timeout')
        return inner.synthesize(text, voice)
      },
    }
    const report = await new Synthesizer(flaky, fastLimiter(), options()).synthesize(translated([[0, 1, 'hola']]))
    expect(report.requests).toBe(2)
    expect(report.segments).toHaveLength(1)
  })

  it('does not retry a configuration error', async () => {
    let calls = 0
    const misconfigured: VoiceService = {
      format: TEST_FORMAT,
      async synthesize() {
        calls++
        throw new ConfigError('unknown voice "robot"')
      },
    }
    await expect(
      new Synthesizer(misconfigured, fastLimiter(), options()).synthesize(translated([[0, 1, 'hola']]))
    ).rejects.toBeInstanceOf(ConfigError)
    expect(calls).toBe(1)
  })

  it('stops waiting to retry once the pipeline is cancelled', async () => {
    const controller = new AbortController()
    let calls = 0
    const failing: VoiceService = {
      format: TEST_FORMAT,
      async synthesize() {
        calls++
        setTimeout(() => controller.abort(), 10)
        throw new Error('socket hang up')
      },
    }
    const synthesizer = new Synthesizer(failing, fastLimiter(), options({ retry: { attempts: 3, baseDelayMs: 60_000 } }))

    const started = Date.now()
    await expect(
      synthesizer.synthesize(translated([[0, 1, 'hola']]), { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError)
    expect(Date.now() - started).toBeLessThan(1000)
    expect(calls).toBe(1)
  })
})
