import { describe, it, expect } from 'vitest';
import { Backoff, backoffDelay } from '../../src/connection/backoff.js';
import type { ReconnectPolicy } from '../../src/config/index.js';

const policy: ReconnectPolicy = { baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5, maxAttempts: 6 };

describe('backoffDelay', () => {
  it('doubles the base delay per attempt without jitter', () => {
    const delays = [1, 2, 3, 4].map((attempt) => backoffDelay({ ...policy, jitter: 0 }, attempt, 0.9));

    expect(delays).toEqual([100, 200, 400, 800]);
  });

  it('adds up to jitter times the delay', () => {
    expect(backoffDelay(policy, 1, 0)).toBe(100);
    expect(backoffDelay(policy, 1, 0.5)).toBe(125);
    expect(backoffDelay(policy, 2, 0.99)).toBe(299);
  });

  it('caps the delay', () => {
    expect(backoffDelay(policy, 10, 0)).toBe(1000);
  });

  it('never decreases across attempts, whatever the random draws', () => {
    const draws = [0.999, 0, 0.999, 0, 0.5, 0.999, 0, 0.999];
    const full: ReconnectPolicy = { baseDelayMs: 50, maxDelayMs: 5000, jitter: 1, maxAttempts: 8 };
    const delays = draws.map((r, index) => backoffDelay(full, index + 1, r));

    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
    }
    expect(delays[delays.length - 1]).toBe(5000);
  });
});

describe('Backoff', () => {
  it('counts attempts and resets to the base delay', () => {
    const backoff = new Backoff({ ...policy, jitter: 0 });

    expect([backoff.next(), backoff.next(), backoff.next()]).toEqual([100, 200, 400]);
    expect(backoff.attempts).toBe(3);

    backoff.reset();

    expect(backoff.attempts).toBe(0);
    expect(backoff.next()).toBe(100);
  });

  it('uses the injected random source', () => {
    const backoff = new Backoff(policy, () => 1);

    expect(backoff.next()).toBe(150);
  });

  it('reports exhaustion after maxAttempts', () => {
    const backoff = new Backoff({ ...policy, maxAttempts: 2 });

    expect(backoff.exhausted).toBe(false);
    backoff.next();
    backoff.next();
    expect(backoff.exhausted).toBe(true);
  });
});
