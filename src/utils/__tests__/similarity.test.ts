import { describe, expect, it } from 'vitest'
import { alignSegments, bestSpanMatch, normalizeForMatch, similarity } from '../similarity'

describe('similarity', () => {
  it('ignores case, punctuation and spacing', () => {
    expect(similarity('Hello, world!', 'hello world')).toBe(1)
    expect(normalizeForMatch('Ｈｅｌｌｏ, World!')).toBe('helloworld')
  })

  it('is an edit-distance ratio', () => {
    expect(similarity('abcd', 'abcf')).toBe(0.75)
  })

  it('treats empty strings', () => {
    expect(similarity('', '')).toBe(1)
    expect(similarity('abc', '')).toBe(0)
    expect(similarity('...', 'abc')).toBe(0)
  })
})

describe('bestSpanMatch', () => {
  it('finds the run of units matching the target', () => {
    expect(bestSpanMatch(['um', 'hello', 'there', 'extra'], 'Hello there!')).toEqual({ start: 1, end: 3, score: 1 })
  })

  it('returns undefined without units', () => {
    expect(bestSpanMatch([], 'anything')).toBeUndefined()
  })
})

describe('alignSegments', () => {
  it('splits a merged echo back onto its cues', () => {
    const groups = alignSegments(
      ['Good morning.', 'How are you?', 'Fine, thanks.'],
      ['Good morning', 'How are you', 'Fine thanks']
    )
    expect(groups).toEqual([
      { start: 0, end: 1, score: 1 },
      { start: 1, end: 2, score: 1 },
      { start: 2, end: 3, score: 1 },
    ])
  })

  it('assigns several units to one cue', () => {
    const groups = alignSegments(['Good', 'morning', 'How are you'], ['Good morning', 'How are you'])
    expect(groups.map((g) => [g.start, g.end])).toEqual([
      [0, 2],
      [2, 3],
    ])
  })

  it('leaves a cue empty when nothing was spoken for it', () => {
    expect(alignSegments(['alpha beta'], ['alpha beta', 'gamma'])).toEqual([
      { start: 0, end: 1, score: 1 },
      { start: 1, end: 1, score: 0 },
    ])
  })

  it('returns no groups for no targets', () => {
    expect(alignSegments(['a'], [])).toEqual([])
  })
})
