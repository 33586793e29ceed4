import { BetError } from "@betlang/errors"
import type { RandomSource } from "../ports/random-source"

/**
 * An index in [0, n) from one draw: `floor(u * n)`.
 */
export function uniformInt(source: RandomSource, n: number): number {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw BetError.invalidArgument("uniformInt", "n must be a positive integer", { n })
  }

  return Math.min(Math.floor(source.next() * n), n - 1)
}

/**
 * A real in [lo, hi) from one draw.
 */
export function uniformReal(source: RandomSource, lo: number, hi: number): number {
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo > hi) {
    throw BetError.invalidArgument("uniformReal", "bounds must be finite with lo <= hi", {
      lo,
      hi,
    })
  }

  return lo + source.next() * (hi - lo)
}
