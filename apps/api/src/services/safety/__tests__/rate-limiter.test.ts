import { describe, it, expect } from '@jest/globals';

import { RateLimiter } from '../rate-limiter.js';

describe('RateLimiter', () => {
  it('spaces acquisitions by 1000 / maxRate ms', () => {
    const limiter = new RateLimiter(10);
    expect(limiter.minIntervalMs).toBe(100);
    expect(limiter.remainingMs(0)).toBe(0);
    limiter.mark(0);
    expect(limiter.remainingMs(50)).toBe(50);
    expect(limiter.remainingMs(100)).toBe(0);
    expect(limiter.remainingMs(250)).toBe(0);
  });

  it('measures the window from the latest mark', () => {
    const limiter = new RateLimiter(10);
    limiter.mark(0);
    limiter.mark(40);
    expect(limiter.remainingMs(100)).toBe(40);
  });

  it('reset() forgets the last acquisition', () => {
    const limiter = new RateLimiter(1);
    limiter.mark(0);
    limiter.reset();
    expect(limiter.remainingMs(1)).toBe(0);
  });

  it('reads the injected clock by default', () => {
    let now = 0;
    const limiter = new RateLimiter(4, () => now);
    limiter.mark();
    now = 200;
    expect(limiter.remainingMs()).toBe(50);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RateLimiter(0)).toThrow(RangeError);
    expect(() => new RateLimiter(Number.POSITIVE_INFINITY)).toThrow('max rate must be a positive number, got Infinity');
  });
});
