import { describe, expect, it } from 'vitest'
import { Translator } from '../translation'
import type { TranslationRequest, TranslationService, TranslatorOptions } from '../translation'
import { CancelledError, ServiceError } from '../../lib/errors'
import { rejectEmpty } from '../../utils/translationCodec'
import { StubTranslationService, cueSetOf, fastLimiter } from '../../__tests__/helpers'

function options(overrides: Partial<TranslatorOptions> = {}): TranslatorOptions {
  return {
    targetLanguage: 'Spanish',
    mode: 'html',
    batch: { maxLines: 10 },
    retry: { attempts: 2, baseDelayMs: 0 },
    checks: [rejectEmpty],
    removeEllipsis: false,
    onCueFailure: 'source',
    maxConcurrent: 4,
    ...overrides,
  }
}

const fourCues = () =>
  cueSetOf([
    [0, 1, 'one'],
    [1, 2, 'two'],
    [2, 3, 'bad'],
    [3, 4, 'four'],
  ])

/** Every batch that contains "bad" comes back with that line empty. */
const dropsBadLine = () => new StubTranslationService((line) => (line === 'bad' ? '' : line.toUpperCase()))

describe('Translator', () => {
  it('translates every cue with one request when replies are valid', async () => {
    const service = new StubTranslationService()
    const cueSet = cueSetOf([
      [0, 1, 'hello'],
      [1, 2, 'good\nbye'],
      [2, 3, 'again'],
    ])
    const report = await new Translator(service, fastLimiter(), options()).translate(cueSet)

    expect(report.requests).toBe(1)
    expect(report.failedCues).toEqual([])
    expect([...cueSet].map((c) => c.translatedText)).toEqual(['HELLO', 'GOOD BYE', 'AGAIN'])
    expect(report.transitions.map((t) => t.state.status)).toEqual(['pending', 'requested', 'accepted'])
    expect(service.requests[0]).toEqual({
      payload: '<L1>hello</L1>\n<L2>good bye</L2>\n<L3>again</L3>',
      mode: 'html',
      targetLanguage: 'Spanish',
      lineCount: 3,
    })
  })

  it('isolates one bad cue in a four-cue batch by bisection', async () => {
    const service = dropsBadLine()
    const cueSet = fourCues()
    const report = await new Translator(service, fastLimiter(), options()).translate(cueSet)

    expect([...cueSet].map((c) => c.translatedText)).toEqual(['ONE', 'TWO', 'bad', 'FOUR'])
    expect(report.failedCues).toEqual([{ index: 3, reason: 'line 1: empty translation for non-empty line' }])
    const bisected = report.transitions.filter((t) => t.state.status === 'bisected').map((t) => t.indices)
    expect(bisected).toEqual([
      [1, 2, 3, 4],
      [3, 4],
    ])
    // [1-4] x2, [1,2] x1, [3,4] x2, [3] x2, [4] x1
    expect(report.requests).toBe(8)
  })

  it('fails the file when a one-cue batch fails and the policy is abort', async () => {
    const translator = new Translator(dropsBadLine(), fastLimiter(), options({ onCueFailure: 'abort' }))
    await expect(translator.translate(fourCues())).rejects.toMatchObject({ code: 'TRANSLATION', cueIndex: 3 })
  })

  it('does not bisect when the backend keeps failing', async () => {
    let calls = 0
    const failing: TranslationService = {
      async translate() {
        calls++
        throw new Error('upstream 503')
      },
    }
    await expect(new Translator(failing, fastLimiter(), options()).translate(fourCues())).rejects.toBeInstanceOf(
      ServiceError
    )
    expect(calls).toBe(2)
  })

  it('retries a malformed reply before accepting', async () => {
    const requests: TranslationRequest[] = []
    const flaky: TranslationService = {
      async translate(request) {
        requests.push(request)
        return requests.length === 1 ? '1. UNO' : '1. UNO\n2. DOS'
      },
    }
    const cueSet = cueSetOf([
      [0, 1, 'one'],
      [1, 2, 'two'],
    ])
    const report = await new Translator(flaky, fastLimiter(), options({ mode: 'plain' })).translate(cueSet)

    expect(report.requests).toBe(2)
    expect(report.transitions.map((t) => t.state)).toEqual([
      { status: 'pending' },
      { status: 'requested', attempt: 1 },
      { status: 'retrying', attempt: 1, reason: 'expected 2 lines, got 1' },
      { status: 'requested', attempt: 2 },
      { status: 'accepted', attempt: 2 },
    ])
    expect(requests[0].payload).toBe('1. one\n2. two')
    expect(cueSet.get(2).translatedText).toBe('DOS')
  })

  it('strips trailing ellipses when asked', async () => {
    const service = new StubTranslationService((line) => `${line.toUpperCase()}...`)
    const cueSet = cueSetOf([[0, 1, 'wait']])
    await new Translator(service, fastLimiter(), options({ removeEllipsis: true })).translate(cueSet)
    expect(cueSet.get(1).translatedText).toBe('WAIT')
  })

  it('skips the backend once the pipeline is cancelled', async () => {
    const service = new StubTranslationService()
    const controller = new AbortController()
    controller.abort()
    await expect(
      new Translator(service, fastLimiter(), options()).translate(fourCues(), { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError)
    expect(service.requests).toHaveLength(0)
  })

  it('stops waiting to retry once the pipeline is cancelled', async () => {
    const controller = new AbortController()
    const requests: TranslationRequest[] = []
    const failing: TranslationService = {
      async translate(request) {
        requests.push(request)
        setTimeout(() => controller.abort(), 10)
        throw new ServiceError('translation', 'upstream 503')
      },
    }
    const translator = new Translator(failing, fastLimiter(), options({ retry: { attempts: 3, baseDelayMs: 60_000 } }))

    const started = Date.now()
    await expect(translator.translate(fourCues(), { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError)
    expect(Date.now() - started).toBeLessThan(1000)
    expect(requests).toHaveLength(1)
  })
})
