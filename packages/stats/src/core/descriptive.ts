import { BetError, requireNonEmpty, requireProbability } from "@betlang/errors"
import type { Summary } from "../ports/stats"

const ascending = (data: readonly number[]): number[] => [...data].sort((a, b) => a - b)

export function mean(data: readonly number[]): number {
  requireNonEmpty("mean", data)

  return data.reduce((sum, x) => sum + x, 0) / data.length
}

/**
 * Middle value; the average of the two middle values for even lengths.
 */
export function median(data: readonly number[]): number {
  requireNonEmpty("median", data)

  const sorted = ascending(data)
  const mid = Math.floor(sorted.length / 2)

  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2
}

/**
 * Population variance: squared deviations divided by n.
 */
export function variance(data: readonly number[]): number {
  requireNonEmpty("variance", data)

  const m = mean(data)

  return data.reduce((sum, x) => sum + (x - m) ** 2, 0) / data.length
}

export function stddev(data: readonly number[]): number {
  requireNonEmpty("stddev", data)

  return Math.sqrt(variance(data))
}

export function minimum(data: readonly number[]): number {
  requireNonEmpty("minimum", data)

  return data.reduce((min, x) => (x < min ? x : min))
}

export function maximum(data: readonly number[]): number {
  requireNonEmpty("maximum", data)

  return data.reduce((max, x) => (x > max ? x : max))
}

export function range(data: readonly number[]): number {
  requireNonEmpty("range", data)

  return maximum(data) - minimum(data)
}

/**
 * Nearest-rank percentile: the value at 1-indexed rank `ceil(p * n)` of the
 * ascending data, clamped to [1, n].
 */
export function percentile(data: readonly number[], p: number): number {
  requireNonEmpty("percentile", data)
  requireProbability("percentile", "p", p)

  const sorted = ascending(data)
  // Drops float noise such as 0.7 * 10 = 7.000000000000001 before the ceiling.
  const exact = Math.round(p * sorted.length * 1e9) / 1e9
  const rank = Math.min(Math.max(Math.ceil(exact), 1), sorted.length)

  return sorted[rank - 1]
}

function requirePaired(operation: string, x: readonly number[], y: readonly number[]): void {
  if (x.length !== y.length || x.length === 0) {
    throw BetError.lengthMismatch(operation, { left: x.length, right: y.length })
  }
}

/**
 * Population covariance.
 */
export function covariance(x: readonly number[], y: readonly number[]): number {
  requirePaired("covariance", x, y)

  const mx = mean(x)
  const my = mean(y)
  let sum = 0
  for (let i = 0; i < x.length; i++) sum += (x[i] - mx) * (y[i] - my)

  return sum / x.length
}

/**
 * Pearson correlation. Undefined, and rejected, when either series is
 * constant.
 */
export function correlation(x: readonly number[], y: readonly number[]): number {
  requirePaired("correlation", x, y)

  const sx = stddev(x)
  const sy = stddev(y)
  if (sx === 0 || sy === 0) {
    throw BetError.invalidArgument("correlation", "series must not have zero variance", {
      stddevX: sx,
      stddevY: sy,
    })
  }

  return covariance(x, y) / (sx * sy)
}

/**
 * Means of every contiguous window; `data.length - window + 1` values.
 */
export function movingAverage(data: readonly number[], window: number): number[] {
  if (!Number.isSafeInteger(window) || window < 1 || window > data.length) {
    throw BetError.invalidArgument("movingAverage", "window must be an integer in [1, length]", {
      window,
      length: data.length,
    })
  }

  const out: number[] = []
  let sum = 0
  for (let i = 0; i < data.length; i++) {
    sum += data[i]
    if (i >= window) sum -= data[i - window]
    if (i >= window - 1) out.push(sum / window)
  }

  return out
}

export function summarize(data: readonly number[]): Summary {
  requireNonEmpty("summarize", data)

  return {
    count: data.length,
    mean: mean(data),
    stddev: stddev(data),
    min: minimum(data),
    q1: percentile(data, 0.25),
    median: median(data),
    q3: percentile(data, 0.75),
    max: maximum(data),
  }
}
