import type { RandomSource } from '@agri-telemetry/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives reproducible sensor noise when a seed is configured.
 */
export class SeededRng implements RandomSource {
  private state: number;
  private spareGaussian: number | null = null;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max]. */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a float in [min, max). */
  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  /** Box-Muller; the second variate of each pair is kept for the next call. */
  gaussian(mean: number, sigma: number): number {
    if (this.spareGaussian !== null) {
      const z = this.spareGaussian;
      this.spareGaussian = null;
      return mean + sigma * z;
    }
    // 1 - next() keeps u1 in (0, 1] so log() stays finite
    const u1 = 1 - this.next();
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;
    this.spareGaussian = radius * Math.sin(theta);
    return mean + sigma * radius * Math.cos(theta);
  }
}

/** Unseeded generator for live sessions. */
export function createRng(seed?: number): SeededRng {
  return new SeededRng(seed ?? Math.floor(Math.random() * 0x100000000));
}
