/**
 * Exponential reconnection backoff with jitter.
 *
 * @module connection/backoff
 */

import type { ReconnectPolicy } from '../config/index.js';

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Delay before reconnection attempt `attempt` (1-based).
 *
 * `min(base · 2^(attempt-1) · (1 + jitter · r), max)`. With `jitter ≤ 1` the
 * jittered delay of one attempt never exceeds the unjittered delay of the
 * next, so delays never decrease from one attempt to the next.
 */
export function backoffDelay(policy: ReconnectPolicy, attempt: number, random: number): number {
  const r = Math.min(Math.max(random, 0), 1);
  const exponential = policy.baseDelayMs * 2 ** Math.max(attempt - 1, 0);
  return Math.min(Math.round(exponential * (1 + policy.jitter * r)), policy.maxDelayMs);
}

/**
 * Attempt counter producing successive backoff delays.
 *
 * @example
 * ```typescript
 * const backoff = new Backoff({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0, maxAttempts: 5 });
 * backoff.next(); // 100
 * backoff.next(); // 200
 * backoff.reset();
 * backoff.next(); // 100
 * ```
 */
export class Backoff {
  private attempt = 0;

  constructor(
    private readonly policy: ReconnectPolicy,
    private readonly random: RandomSource = Math.random,
  ) {}

  /**
   * Attempts made since the last reset.
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * Whether the attempt budget is used up.
   */
  get exhausted(): boolean {
    return this.attempt >= this.policy.maxAttempts;
  }

  /**
   * Counts one more attempt and returns the delay to wait before it.
   */
  next(): number {
    this.attempt++;
    return backoffDelay(this.policy, this.attempt, this.random());
  }

  reset(): void {
    this.attempt = 0;
  }
}
