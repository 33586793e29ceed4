import { requireNonEmpty } from "@betlang/errors"
import type { FrequencyTable } from "../ports/stats"
import { canonicalKey } from "./canonical-key"

export function frequencyTable<T>(samples: readonly T[]): FrequencyTable<T> {
  const entries = new Map<string, { value: T; count: number }>()

  for (const value of samples) {
    const key = canonicalKey(value)
    const entry = entries.get(key)
    if (entry) entry.count++
    else entries.set(key, { value, count: 1 })
  }

  return [...entries.values()]
}

/**
 * Every value sharing the highest frequency, in first-seen order.
 */
export function mode<T>(data: readonly T[]): T[] {
  requireNonEmpty("mode", data)

  const table = frequencyTable(data)
  const top = table.reduce((most, entry) => Math.max(most, entry.count), 0)

  return table.filter((entry) => entry.count === top).map((entry) => entry.value)
}

/**
 * Shannon entropy, in bits, of the empirical distribution of `samples`.
 */
export function entropy<T>(samples: readonly T[]): number {
  requireNonEmpty("entropy", samples)

  let bits = 0
  for (const { count } of frequencyTable(samples)) {
    const p = count / samples.length
    bits -= p * Math.log2(p)
  }

  return bits
}
