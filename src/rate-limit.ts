// Token-bucket rate limiter for Gmail API quota units.
// The bucket holds `rate` units and refills at `rate` units per second.
// Callers spend the method's quota cost before each request and wait for a
// refill when the bucket runs dry.
// Quota costs: https://developers.google.com/gmail/api/reference/quota

import { sleep as defaultSleep } from './api-utils.js'

/** Per-method Gmail quota cost in units. */
export const QUOTA_UNITS = {
  getProfile: 1,
  labelsList: 1,
  threadsList: 10,
  threadsGet: 10,
  messagesBatchModify: 50,
} as const

/** Gmail per-user limit: 250 quota units per second. */
export const DEFAULT_RATE = 250

export class RateLimiter {
  private readonly rate: number
  private units: number
  private last: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor({
    rate = DEFAULT_RATE,
    now = Date.now,
    sleep = defaultSleep,
  }: {
    rate?: number
    now?: () => number
    sleep?: (ms: number) => Promise<void>
  } = {}) {
    if (!(rate > 0)) throw new RangeError(`rate must be positive, got ${rate}`)
    this.rate = rate
    this.units = rate
    this.now = now
    this.sleep = sleep
    this.last = now()
  }

  /** Units currently available, after refill. */
  get available(): number {
    this.refill()
    return this.units
  }

  private refill(): void {
    const current = this.now()
    const elapsedSec = Math.max(0, current - this.last) / 1000
    this.units = Math.min(this.rate, this.units + elapsedSec * this.rate)
    this.last = current
  }

  /** Spend `units` tokens, sleeping until the bucket has enough. */
  async wait(units = 1): Promise<void> {
    if (units > this.rate) {
      throw new RangeError(`rate limit: request too big (req: ${units}, max ${this.rate})`)
    }
    this.refill()
    while (units > this.units) {
      const deficit = units - this.units
      await this.sleep(Math.ceil((deficit / this.rate) * 1000))
      this.refill()
    }
    this.units -= units
  }
}
