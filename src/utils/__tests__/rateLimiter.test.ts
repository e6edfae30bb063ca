import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RateLimiter } from '../rateLimiter'

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function limiter() {
    return new RateLimiter({
      translation: { requests: 2, windowMs: 1000 },
      synthesis: { requests: 1, windowMs: 500 },
    })
  }

  it('admits no more than `requests` permits in any window', async () => {
    const rl = limiter()
    const admittedAt: number[] = []
    for (let i = 0; i < 5; i++) {
      void rl.acquire('translation').then(() => admittedAt.push(Date.now()))
    }

    await vi.advanceTimersByTimeAsync(0)
    expect(admittedAt).toEqual([0, 0])
    expect(rl.pending('translation')).toBe(3)

    await vi.advanceTimersByTimeAsync(999)
    expect(admittedAt).toEqual([0, 0])

    await vi.advanceTimersByTimeAsync(1)
    expect(admittedAt).toEqual([0, 0, 1000, 1000])

    await vi.advanceTimersByTimeAsync(1000)
    expect(admittedAt).toEqual([0, 0, 1000, 1000, 2000])
    expect(rl.pending('translation')).toBe(0)

    for (let i = 2; i < admittedAt.length; i++) {
      expect(admittedAt[i] - admittedAt[i - 2]).toBeGreaterThanOrEqual(1000)
    }
  })

  it('serves waiters in arrival order', async () => {
    const rl = limiter()
    const order: number[] = []
    for (let i = 0; i < 4; i++) {
      void rl.acquire('synthesis').then(() => order.push(i))
    }
    await vi.advanceTimersByTimeAsync(1500)
    expect(order).toEqual([0, 1, 2, 3])
  })

  it('keeps service classes independent', async () => {
    const rl = limiter()
    const done: string[] = []
    void rl.acquire('translation').then(() => done.push('t1'))
    void rl.acquire('translation').then(() => done.push('t2'))
    void rl.acquire('translation').then(() => done.push('t3'))
    void rl.acquire('synthesis').then(() => done.push('s1'))
    await vi.advanceTimersByTimeAsync(0)
    expect(done).toEqual(['t1', 't2', 's1'])
  })

  it('rejects an invalid rate', () => {
    expect(
      () =>
        new RateLimiter({
          translation: { requests: 0, windowMs: 1000 },
          synthesis: { requests: 1, windowMs: 1000 },
        })
    ).toThrow(RangeError)
  })
})
