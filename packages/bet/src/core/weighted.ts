import { BetError, requireNonEmpty } from "@betlang/errors"
import { current } from "@betlang/random"
import type { WeightedEntry, WeightedOutcome } from "../ports/outcome"

export function toWeightedOutcome<T>(entry: WeightedEntry<T>): WeightedOutcome<T> {
  if ("weight" in entry) return entry

  const [value, weight] = entry

  return { value, weight }
}

/**
 * One draw: `r = u * total`, then the first outcome whose cumulative weight
 * exceeds `r`. Zero-weight outcomes are never selected.
 */
export function selectWeighted<T>(operation: string, entries: readonly WeightedOutcome<T>[]): T {
  requireNonEmpty(operation, entries)

  let total = 0
  for (const { weight } of entries) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw BetError.invalidArgument(operation, "weights must be finite and non-negative", {
        weights: entries.map((entry) => entry.weight),
      })
    }
    total += weight
  }

  if (total === 0) {
    throw BetError.zeroWeightSum(
      operation,
      entries.map((entry) => entry.weight),
    )
  }

  const r = current().next() * total
  let cumulative = 0
  let chosen: WeightedOutcome<T> | undefined

  // Falls through to the last positive weight when rounding leaves r >= sum.
  for (const entry of entries) {
    if (entry.weight === 0) continue
    chosen = entry
    cumulative += entry.weight
    if (r < cumulative) break
  }

  if (chosen === undefined) throw BetError.zeroWeightSum(operation, [])

  return chosen.value
}
