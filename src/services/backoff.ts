export interface BackoffPolicy {
  /** Delay after the first consecutive failure. */
  baseDelayMs: number;
  /** Ceiling for the computed delay; a provider hint may exceed it. */
  maxDelayMs: number;
}

interface BackoffState {
  failures: number;
  retryAt: number;
}

/**
 * Per-key exponential backoff bookkeeping. Callers ask `isBlocked` before an
 * attempt and report the outcome; nothing here sleeps or schedules.
 */
export class BackoffTracker {
  private readonly states = new Map<string, BackoffState>();

  constructor(private readonly policy: BackoffPolicy) {}

  isBlocked(key: string, now: Date): boolean {
    const state = this.states.get(key);
    return state !== undefined && now.getTime() < state.retryAt;
  }

  /** Returns the delay applied before the next attempt. */
  recordFailure(key: string, now: Date, hintMs: number | null = null): number {
    const failures = (this.states.get(key)?.failures ?? 0) + 1;
    const exponential = Math.min(this.policy.maxDelayMs, this.policy.baseDelayMs * 2 ** (failures - 1));
    const delay = hintMs !== null && hintMs > exponential ? hintMs : exponential;
    this.states.set(key, { failures, retryAt: now.getTime() + delay });
    return delay;
  }

  recordSuccess(key: string): void {
    this.states.delete(key);
  }

  failures(key: string): number {
    return this.states.get(key)?.failures ?? 0;
  }
}
