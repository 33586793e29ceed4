import { requireCount, requireNonEmpty } from "@betlang/errors"
import type { Histogram } from "../ports/stats"
import { maximum, minimum } from "./descriptive"

const SPARK_LEVELS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"] as const
const FLAT_LEVEL = "▄"
const BAR = "█"

/**
 * `bins` equal-width bins over [min, max]; the maximum lands in the last bin.
 * A constant series is binned over [min, min + bins].
 */
export function histogram(data: readonly number[], bins: number): Histogram {
  requireNonEmpty("histogram", data)
  requireCount("histogram", "bins", bins, 1)

  const lo = minimum(data)
  const hi = maximum(data)
  const width = hi > lo ? (hi - lo) / bins : 1
  const edges = Array.from({ length: bins + 1 }, (_, i) =>
    i === bins && hi > lo ? hi : lo + i * width,
  )
  const counts = Array.from({ length: bins }, () => 0)

  for (const x of data) {
    counts[Math.min(Math.floor((x - lo) / width), bins - 1)]++
  }

  return { edges, counts }
}

/**
 * One block character per value, scaled between the series' min and max.
 */
export function sparkline(data: readonly number[]): string {
  if (data.length === 0) return ""

  const lo = minimum(data)
  const hi = maximum(data)
  if (hi === lo) return FLAT_LEVEL.repeat(data.length)

  const top = SPARK_LEVELS.length - 1

  return data.map((x) => SPARK_LEVELS[Math.round(((x - lo) / (hi - lo)) * top)]).join("")
}

/**
 * Text bars, one line per bin: `<lo> - <hi> | <bar> <count>`, the fullest
 * bin drawn `width` characters wide.
 */
export function renderHistogram(data: readonly number[], bins: number, width: number): string[] {
  requireCount("renderHistogram", "width", width, 1)

  const { edges, counts } = histogram(data, bins)
  const peak = counts.reduce((most, count) => Math.max(most, count), 0)

  const labels = counts.map((_, i) => `${edges[i].toFixed(2)} - ${edges[i + 1].toFixed(2)}`)
  const labelWidth = labels.reduce((widest, label) => Math.max(widest, label.length), 0)

  return counts.map(
    (count, i) =>
      `${labels[i].padStart(labelWidth)} | ${BAR.repeat(Math.round((count / peak) * width))} ${count}`,
  )
}
