import { bet } from "@betlang/bet"
import { BetError, requireCount } from "@betlang/errors"
import { current, uniformInt } from "@betlang/random"

/**
 * `steps + 1` positions starting at 0, each step adding `bet(-1, 0, 1)`.
 */
export function randomWalk(steps: number): number[] {
  requireCount("randomWalk", "steps", steps)

  const walk = [0]
  let position = 0
  for (let i = 0; i < steps; i++) {
    position += bet(-1, 0, 1)
    walk.push(position)
  }

  return walk
}

/**
 * `k` independent picks, one draw each.
 */
export function sampleWithReplacement<T>(xs: readonly T[], k: number): T[] {
  requireCount("sampleWithReplacement", "k", k)
  if (k > 0 && xs.length === 0) throw BetError.emptyInput("sampleWithReplacement")

  const source = current()

  return Array.from({ length: k }, () => xs[uniformInt(source, xs.length)])
}

/**
 * `min(k, xs.length)` distinct positions in selection order, one draw each.
 * A partial Fisher–Yates over a copy.
 */
export function sampleWithoutReplacement<T>(xs: readonly T[], k: number): T[] {
  requireCount("sampleWithoutReplacement", "k", k)

  const pool = [...xs]
  const count = Math.min(k, pool.length)
  const source = current()

  for (let i = 0; i < count; i++) {
    const j = i + uniformInt(source, pool.length - i)
    ;[pool[i], pool[j]] = [pool[j], pool[i]]
  }

  return pool.slice(0, count)
}

/**
 * A shuffled copy. Fisher–Yates from the end, `xs.length - 1` draws.
 */
export function shuffle<T>(xs: readonly T[]): T[] {
  const out = [...xs]
  const source = current()

  for (let i = out.length - 1; i > 0; i--) {
    const j = uniformInt(source, i + 1)
    ;[out[i], out[j]] = [out[j], out[i]]
  }

  return out
}
