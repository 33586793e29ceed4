export type FrequencyEntry<T> = {
  value: T
  count: number
}

/** Distinct values with their counts, in first-seen order. */
export type FrequencyTable<T> = readonly FrequencyEntry<T>[]

/** Five-number summary plus moments, as used for box plots. */
export type Summary = {
  count: number
  mean: number
  stddev: number
  min: number
  q1: number
  median: number
  q3: number
  max: number
}

export type Histogram = {
  /** `bins + 1` ascending boundaries. */
  edges: number[]
  counts: number[]
}
