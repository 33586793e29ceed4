import { BetError, requireCount } from "@betlang/errors"
import type { BetUntilOptions } from "../ports/options"
import type { Thunk } from "../ports/outcome"
import { bet, betLazy } from "./select"

/**
 * Applies `step` to `init` exactly `n` times.
 */
export function betChain<T>(n: number, step: (value: T) => T, init: T): T {
  requireCount("betChain", "n", n)

  let value = init
  for (let i = 0; i < n; i++) value = step(value)

  return value
}

export function betRepeat<T>(n: number, thunk: Thunk<T>): T[] {
  requireCount("betRepeat", "n", n)

  return Array.from({ length: n }, () => thunk())
}

/**
 * Evaluates all three functions on the argument, then bets among the results.
 */
export function betCompose<A, R>(
  f: (x: A) => R,
  g: (x: A) => R,
  h: (x: A) => R,
): (x: A) => R {
  return (x) => bet(f(x), g(x), h(x))
}

/**
 * Per element, one draw: `f(x)` with probability 2/3, `x` unchanged with 1/3.
 * `f` only runs for elements it was chosen for.
 */
export function betMap<T, U>(f: (x: T) => U, xs: readonly T[]): (T | U)[] {
  return xs.map((x) =>
    betLazy(
      () => f(x),
      () => x,
      () => f(x),
    ),
  )
}

/**
 * Per element, one draw of `bet(pred(x), true, false)` decides whether it is
 * kept. The result is always a subsequence of `xs`.
 */
export function betFilter<T>(pred: (x: T) => boolean, xs: readonly T[]): T[] {
  return xs.filter((x) => bet(pred(x), true, false))
}

/**
 * Invokes `thunk` until `pred` accepts the result. Unbounded unless
 * `maxAttempts` is given.
 */
export function betUntil<T>(
  pred: (value: T) => boolean,
  thunk: Thunk<T>,
  options: BetUntilOptions = {},
): T {
  const { maxAttempts, logger } = options
  if (maxAttempts !== undefined) requireCount("betUntil", "maxAttempts", maxAttempts, 1)

  for (let attempts = 1; ; attempts++) {
    const value = thunk()
    if (pred(value)) return value

    if (maxAttempts !== undefined && attempts >= maxAttempts) {
      logger?.warn("Predicate not satisfied within attempt cap", {
        module: "bet",
        operation: "betUntil",
        maxAttempts,
      })
      throw BetError.iterationLimitExceeded("betUntil", maxAttempts)
    }
  }
}

/**
 * `n` independent `bet(a, b, c)` draws in index order.
 */
export function betParallel<T>(n: number, a: T, b: T, c: T): T[] {
  requireCount("betParallel", "n", n)

  return Array.from({ length: n }, () => bet(a, b, c))
}

/**
 * Fraction of `trials` runs of `thunk` whose result satisfies `pred`.
 */
export function estimateProbability<T>(
  trials: number,
  thunk: Thunk<T>,
  pred: (value: T) => boolean,
): number {
  requireCount("estimateProbability", "trials", trials, 1)

  let hits = 0
  for (let i = 0; i < trials; i++) {
    if (pred(thunk())) hits++
  }

  return hits / trials
}
