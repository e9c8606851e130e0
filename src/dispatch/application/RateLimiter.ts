// src/dispatch/application/RateLimiter.ts

/**
 * Sliding one-minute window over outbound tool calls.
 *
 * tryAcquire() is synchronous: the window is updated before the caller
 * awaits anything, so concurrent invocations cannot over-admit.
 */

export type Clock = () => number;

const WINDOW_MS = 60_000;

export interface IRateLimiter {
  readonly limitPerMinute: number;
  tryAcquire(): boolean;
}

export class SlidingWindowRateLimiter implements IRateLimiter {
  private timestamps: number[] = [];

  /**
   * @param limitPerMinute Admissions per rolling 60 s; 0 admits everything.
   * @param now            Millisecond clock, injectable for tests.
   */
  public constructor(
    public readonly limitPerMinute: number,
    private readonly now: Clock = Date.now,
  ) {}

  public tryAcquire(): boolean {
    if (this.limitPerMinute <= 0) {
      return true;
    }

    const current = this.now();
    this.timestamps = this.timestamps.filter((ts) => current - ts < WINDOW_MS);

    if (this.timestamps.length >= this.limitPerMinute) {
      return false;
    }

    this.timestamps.push(current);
    return true;
  }
}
