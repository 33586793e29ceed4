import { BetError, requireCount, requireNonEmpty } from "@betlang/errors"
import { sampleWithReplacement } from "@betlang/distributions"

/**
 * Pearson's statistic Σ (O − E)² / E.
 */
export function chiSquareTest(observed: readonly number[], expected: readonly number[]): number {
  if (observed.length !== expected.length) {
    throw BetError.lengthMismatch("chiSquareTest", {
      left: observed.length,
      right: expected.length,
    })
  }
  requireNonEmpty("chiSquareTest", observed)

  let statistic = 0
  for (let i = 0; i < observed.length; i++) {
    const e = expected[i]
    if (e === 0) throw BetError.zeroExpectedFrequency(i)
    statistic += (observed[i] - e) ** 2 / e
  }

  return statistic
}

/**
 * `nSamples` values of `statistic`, each over a same-length resample of
 * `data` drawn with replacement from the ambient context.
 */
export function bootstrap<T, R>(
  data: readonly T[],
  nSamples: number,
  statistic: (sample: T[]) => R,
): R[] {
  requireNonEmpty("bootstrap", data)
  requireCount("bootstrap", "nSamples", nSamples)

  return Array.from({ length: nSamples }, () =>
    statistic(sampleWithReplacement(data, data.length)),
  )
}
