/**
 * Source of randomness.
 *
 * @remarks
 * `next()` MUST return a floating-point number in the range [0, 1). Each call
 * is one draw.
 */
export interface RandomSource {
  next(): number
}

/**
 * A reproducible source: the same seed always yields the same sequence.
 */
export interface SeededSource extends RandomSource {
  readonly seed: number

  /** Draws taken so far. */
  readonly position: number
}
