/**
 * Minimum-interval limiter: at most `maxRate` acquisitions per second.
 * Never sleeps; callers get the remaining wait back and decide themselves.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private lastAcquiredMs: number | null = null;

  constructor(
    readonly maxRate: number,
    private readonly clock: () => number = Date.now,
  ) {
    if (!(maxRate > 0) || !Number.isFinite(maxRate)) {
      throw new RangeError(`max rate must be a positive number, got ${maxRate}`);
    }
    this.minIntervalMs = 1000 / maxRate;
  }

  /** Milliseconds until the next acquisition is allowed; 0 when allowed now. */
  remainingMs(nowMs: number = this.clock()): number {
    if (this.lastAcquiredMs === null) return 0;
    return Math.max(0, this.lastAcquiredMs + this.minIntervalMs - nowMs);
  }

  /** Records an acquisition; callers check `remainingMs` first. */
  mark(nowMs: number = this.clock()): void {
    this.lastAcquiredMs = nowMs;
  }

  reset(): void {
    this.lastAcquiredMs = null;
  }
}
