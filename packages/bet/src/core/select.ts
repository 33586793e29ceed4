import { current, uniformInt } from "@betlang/random"
import type { BetGenerator, TernaryValue, Thunk, WeightedEntry } from "../ports/outcome"
import { selectWeighted, toWeightedOutcome } from "./weighted"

/**
 * Uniform choice among three outcomes, one draw.
 *
 * @example
 * ```ts
 * withSeed(42, () => bet("rock", "paper", "scissors"))
 * ```
 */
export function bet<T>(a: T, b: T, c: T): T {
  const index = uniformInt(current(), 3)

  return index === 0 ? a : index === 1 ? b : c
}

/**
 * Weighted choice among three outcomes, one draw. Throws `invalid_argument`
 * on a negative or non-finite weight and `zero_weight_sum` when all are zero.
 */
export function betWeighted<T>(a: WeightedEntry<T>, b: WeightedEntry<T>, c: WeightedEntry<T>): T {
  return selectWeighted("betWeighted", [a, b, c].map((entry) => toWeightedOutcome(entry)))
}

/**
 * Weighted choice over any non-empty list, one draw.
 */
export function betCategorical<T>(entries: readonly WeightedEntry<T>[]): T {
  return selectWeighted("betCategorical", entries.map((entry) => toWeightedOutcome(entry)))
}

/**
 * `a` without drawing when `condition` holds, otherwise `bet(b, c, a)`.
 */
export function betConditional<T>(condition: boolean, a: T, b: T, c: T): T {
  return condition ? a : bet(b, c, a)
}

/**
 * One draw picks a thunk; only that one is invoked.
 */
export function betLazy<A, B, C>(a: Thunk<A>, b: Thunk<B>, c: Thunk<C>): A | B | C {
  const index = uniformInt(current(), 3)

  return index === 0 ? a() : index === 1 ? b() : c()
}

export function makeGenerator<T>(a: T, b: T, c: T): BetGenerator<T> {
  return () => bet(a, b, c)
}

export function betTernary(): TernaryValue {
  return bet<TernaryValue>("true", "false", "unknown")
}
