import { BetError } from "@betlang/errors"
import { type RandomGenerator, unsafeUniformIntDistribution, xoroshiro128plus } from "pure-rand"
import type { SeededSource } from "../../ports/random-source"

const HIGH_BITS = 2 ** 26 - 1
const LOW_BITS = 2 ** 27 - 1
const TWO_POW_27 = 2 ** 27
const TWO_POW_MINUS_53 = 2 ** -53

/**
 * Folds the bits above 32 into the low word so that safe integers differing
 * only in their high bits still seed different streams.
 */
export function mixSeed(seed: number): number {
  const high = Math.floor(seed / 2 ** 32)

  return (seed ^ Math.imul(high, 0x9e3779b1)) | 0
}

/**
 * xoroshiro128+ producing 53-bit floats. One `next()` consumes two 32-bit
 * steps of the underlying generator but counts as a single draw.
 */
export class SeededRandom implements SeededSource {
  private readonly rng: RandomGenerator
  private drawn = 0

  constructor(readonly seed: number) {
    if (!Number.isSafeInteger(seed)) throw BetError.invalidSeed(seed)

    this.rng = xoroshiro128plus(mixSeed(seed))
  }

  get position(): number {
    return this.drawn
  }

  next(): number {
    const high = unsafeUniformIntDistribution(0, HIGH_BITS, this.rng)
    const low = unsafeUniformIntDistribution(0, LOW_BITS, this.rng)
    this.drawn++

    return (high * TWO_POW_27 + low) * TWO_POW_MINUS_53
  }
}
