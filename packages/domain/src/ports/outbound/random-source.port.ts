export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
  /** Integer in [min, max]. */
  nextInt(min: number, max: number): number;
  nextFloat(min: number, max: number): number;
}
