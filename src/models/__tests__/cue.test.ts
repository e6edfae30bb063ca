import { describe, expect, expectTypeOf, it } from 'vitest'
import { CueSet } from '../cue'
import type { Cue } from '../cue'
import { CueSetError } from '../../lib/errors'

describe('CueSet', () => {
  const rows = [
    { index: 1, start: 0, end: 1, sourceText: 'one' },
    { index: 2, start: 1, end: 2, sourceText: 'two' },
  ]

  it('keeps insertion order and looks cues up by index', () => {
    const set = new CueSet(rows)
    expect(set.size).toBe(2)
    expect([...set].map((c) => c.index)).toEqual([1, 2])
    expect(set.get(2).sourceText).toBe('two')
    expect(set.at(0)?.index).toBe(1)
  })

  it('rejects invalid cue lists', () => {
    expect(() => new CueSet([{ index: 1, start: 2, end: 2, sourceText: 'x' }])).toThrow(CueSetError)
    expect(() => new CueSet([rows[0], { ...rows[1], index: 1 }])).toThrow('duplicate cue index 1')
    expect(() => new CueSet([rows[1], rows[0]])).toThrow(CueSetError)
  })

  it('only voices cues with translated text', () => {
    const set = new CueSet(rows)
    set.setTranslation(2, 'dos')
    expect(set.voiced().map((c) => c.index)).toEqual([2])
    expect(() => set.setTranslation(9, 'x')).toThrow('no cue with index 9')
  })

  it('clones independently', () => {
    const set = new CueSet(rows)
    const copy = set.clone()
    copy.setTranslation(1, 'uno')
    expect(set.get(1).translatedText).toBe('')
  })

  it('hands out cues whose fields callers cannot reassign', () => {
    expectTypeOf<Cue>().toEqualTypeOf<Readonly<Cue>>()
    const set = new CueSet(rows)
    const [first] = set.toArray()
    set.setTranslation(1, 'uno')
    expect(first.translatedText).toBe('uno')
    expect(set.get(1)).toBe(first)
  })
})
