/**
 * Interval Rate Limiter
 *
 * Enforces a minimum gap between consecutive grants across every caller in the
 * process. Grants are chained on a single promise tail, so they are issued in
 * request order and the "last grant" timestamp has exactly one writer at a time.
 */

import type { RateLimiter } from '../types.js'
import { sleep } from '../../utils/sleep.js'

export interface IntervalRateLimiterOptions {
  /** Minimum milliseconds between two grants. 0 disables throttling. */
  minIntervalMs: number
}

export class IntervalRateLimiter implements RateLimiter {
  private readonly minIntervalMs: number
  private lastGrantAt: number | null = null
  private waiting = 0
  private tail: Promise<void> = Promise.resolve()

  constructor(options: IntervalRateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs)
  }

  /**
   * Build a limiter from a (possibly fractional) number of seconds.
   */
  static fromSeconds(seconds: number): IntervalRateLimiter {
    return new IntervalRateLimiter({ minIntervalMs: Math.ceil(seconds * 1000) })
  }

  /**
   * Block until at least minIntervalMs has passed since the previous grant.
   * Resolves false, without taking a grant, when `signal` aborts first.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (this.minIntervalMs === 0) {
      return Promise.resolve(true)
    }

    this.waiting++
    const grant = this.tail.then(() => this.waitForTurn(signal))
    this.tail = grant.then(() => undefined)
    return grant
  }

  /**
   * Current state (for debugging/monitoring).
   */
  getState(): { minIntervalMs: number; lastGrantAt: number | null; waiting: number } {
    return {
      minIntervalMs: this.minIntervalMs,
      lastGrantAt: this.lastGrantAt,
      waiting: this.waiting,
    }
  }

  private async waitForTurn(signal?: AbortSignal): Promise<boolean> {
    try {
      if (signal?.aborted) {
        return false
      }
      if (this.lastGrantAt !== null) {
        const waitMs = this.lastGrantAt + this.minIntervalMs - Date.now()
        if (waitMs > 0 && !(await sleep(waitMs, signal))) {
          return false
        }
      }
      this.lastGrantAt = Date.now()
      return true
    } finally {
      this.waiting--
    }
  }
}
