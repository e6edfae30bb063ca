/**
 * Per-service-class request admission shared by every stage and every file in the process.
 * Same bookkeeping as a per-user upload window: timestamps of recent admissions, pruned as they age out.
 * A permit taken at t is given back at t + windowMs, so no window of that length admits more than `requests`.
 */

export const SERVICE_CLASSES = ['translation', 'synthesis'] as const

export type ServiceClass = (typeof SERVICE_CLASSES)[number]

export interface RateWindow {
  /** Requests admitted per window. */
  requests: number
  windowMs: number
}

interface Bucket {
  rate: RateWindow
  admitted: number[]
  waiters: Array<() => void>
  timer: NodeJS.Timeout | undefined
}

export class RateLimiter {
  private readonly buckets = new Map<ServiceClass, Bucket>()

  constructor(windows: Record<ServiceClass, RateWindow>) {
    for (const serviceClass of SERVICE_CLASSES) {
      const rate = windows[serviceClass]
      if (!Number.isInteger(rate.requests) || rate.requests < 1 || !(rate.windowMs > 0)) {
        throw new RangeError(`invalid rate for ${serviceClass}: ${rate.requests} per ${rate.windowMs}ms`)
      }
      this.buckets.set(serviceClass, { rate, admitted: [], waiters: [], timer: undefined })
    }
  }

  /** Resolves once a permit is available. Never rejects. */
  acquire(serviceClass: ServiceClass): Promise<void> {
    const bucket = this.bucket(serviceClass)
    return new Promise<void>((resolve) => {
      bucket.waiters.push(resolve)
      this.drain(bucket)
    })
  }

  /** Callers currently waiting for a permit. */
  pending(serviceClass: ServiceClass): number {
    return this.bucket(serviceClass).waiters.length
  }

  private bucket(serviceClass: ServiceClass): Bucket {
    const bucket = this.buckets.get(serviceClass)
    if (!bucket) throw new RangeError(`no rate configured for ${serviceClass}`)
    return bucket
  }

  private drain(bucket: Bucket): void {
    const now = Date.now()
    const { requests, windowMs } = bucket.rate
    bucket.admitted = bucket.admitted.filter((t) => now - t < windowMs)

    while (bucket.waiters.length > 0 && bucket.admitted.length < requests) {
      const next = bucket.waiters.shift()
      if (!next) break
      bucket.admitted.push(now)
      next()
    }

    if (bucket.waiters.length > 0 && !bucket.timer) {
      const wait = Math.max(0, bucket.admitted[0] + windowMs - now)
      bucket.timer = setTimeout(() => {
        bucket.timer = undefined
        this.drain(bucket)
      }, wait)
    }
  }
}
