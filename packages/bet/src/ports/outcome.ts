export type WeightedOutcome<T> = {
  value: T
  /** Non-negative and finite. Probability is weight / total weight. */
  weight: number
}

/** `[value, weight]` or `{ value, weight }`. */
export type WeightedEntry<T> = WeightedOutcome<T> | readonly [value: T, weight: number]

export type TernaryValue = "true" | "false" | "unknown"

export type Thunk<T> = () => T

/** Zero-argument selector drawing afresh from the ambient context per call. */
export type BetGenerator<T> = () => T
