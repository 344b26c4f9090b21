export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
  /** Float in [min, max). */
  nextFloat(min: number, max: number): number;
  /** Normally distributed sample. */
  gaussian(mean: number, sigma: number): number;
}
