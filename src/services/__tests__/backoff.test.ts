import { describe, it, expect } from 'vitest';
import { BackoffTracker } from '../backoff.js';
import { T0 } from './helpers.js';

const at = (ms: number) => new Date(T0.getTime() + ms);

describe('BackoffTracker', () => {
  it('doubles the delay per consecutive failure up to the cap', () => {
    const backoff = new BackoffTracker({ baseDelayMs: 1_000, maxDelayMs: 5_000 });

    expect(backoff.recordFailure('a', T0)).toBe(1_000);
    expect(backoff.recordFailure('a', T0)).toBe(2_000);
    expect(backoff.recordFailure('a', T0)).toBe(4_000);
    expect(backoff.recordFailure('a', T0)).toBe(5_000);
    expect(backoff.failures('a')).toBe(4);
  });

  it('blocks a key until its retry time', () => {
    const backoff = new BackoffTracker({ baseDelayMs: 1_000, maxDelayMs: 5_000 });
    backoff.recordFailure('a', T0);

    expect(backoff.isBlocked('a', at(999))).toBe(true);
    expect(backoff.isBlocked('a', at(1_000))).toBe(false);
    expect(backoff.isBlocked('b', T0)).toBe(false);
  });

  it('honours a longer provider hint', () => {
    const backoff = new BackoffTracker({ baseDelayMs: 1_000, maxDelayMs: 5_000 });

    expect(backoff.recordFailure('a', T0, 8_000)).toBe(8_000);
    expect(backoff.recordFailure('a', T0, 500)).toBe(2_000);
  });

  it('forgets a key after success', () => {
    const backoff = new BackoffTracker({ baseDelayMs: 1_000, maxDelayMs: 5_000 });
    backoff.recordFailure('a', T0);
    backoff.recordSuccess('a');

    expect(backoff.isBlocked('a', T0)).toBe(false);
    expect(backoff.failures('a')).toBe(0);
    expect(backoff.recordFailure('a', T0)).toBe(1_000);
  });
});
