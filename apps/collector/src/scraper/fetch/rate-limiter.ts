/**
 * Jittered Rate Limiter
 *
 * Hands out a fresh delay, drawn uniformly from [minDelayMs, maxDelayMs],
 * before every request. Callers sleep for the returned duration first.
 *
 * Memoryless: no record of previous draws is kept, so one instance can be
 * shared by any number of workers. Each worker waits on its own draw, which
 * keeps workers from bursting in lockstep. There is no global budget: the
 * aggregate request rate grows with the worker count.
 */

import type { DelaySource } from '../types.js'

export interface JitterRateLimiterConfig {
  minDelayMs: number
  maxDelayMs: number
}

export class JitterRateLimiter implements DelaySource {
  readonly minDelayMs: number
  readonly maxDelayMs: number
  private readonly random: () => number

  /**
   * @throws RangeError unless 0 <= minDelayMs <= maxDelayMs
   */
  constructor(config: JitterRateLimiterConfig, random: () => number = Math.random) {
    const { minDelayMs, maxDelayMs } = config
    if (!Number.isFinite(minDelayMs) || !Number.isFinite(maxDelayMs)) {
      throw new RangeError('Rate limit bounds must be finite numbers')
    }
    if (minDelayMs < 0 || minDelayMs > maxDelayMs) {
      throw new RangeError(
        `Rate limit bounds must satisfy 0 <= min <= max (got min=${minDelayMs}, max=${maxDelayMs})`
      )
    }

    this.minDelayMs = minDelayMs
    this.maxDelayMs = maxDelayMs
    this.random = random
  }

  nextDelay(): number {
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs)
  }
}

/**
 * Build a limiter from a delay range expressed in seconds.
 */
export function rateLimiterFromSeconds(
  range: { min: number; max: number },
  random?: () => number
): JitterRateLimiter {
  return new JitterRateLimiter({ minDelayMs: range.min * 1000, maxDelayMs: range.max * 1000 }, random)
}
