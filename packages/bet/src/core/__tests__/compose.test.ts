import { isBetError } from "@betlang/errors"
import type { Logger } from "@betlang/logger"
import { draw, withSeed } from "@betlang/random"
import { mock } from "vitest-mock-extended"
import {
  betChain,
  betCompose,
  betFilter,
  betMap,
  betParallel,
  betRepeat,
  betUntil,
  estimateProbability,
} from "../compose"
import { bet, betWeighted } from "../select"

const caught = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe("betChain", () => {
  it("returns init when n is 0", () => {
    const step = vi.fn((x: number) => x + 1)

    expect(betChain(0, step, 5)).toBe(5)
    expect(step).not.toHaveBeenCalled()
  })

  it("applies the step n times", () => {
    expect(betChain(10, (x: number) => x + 1, 0)).toBe(10)
  })

  it("rejects a negative or fractional n", () => {
    expect(isBetError(caught(() => betChain(-1, (x: number) => x, 0)), "invalid_argument")).toBe(true)
    expect(isBetError(caught(() => betChain(1.5, (x: number) => x, 0)), "invalid_argument")).toBe(true)
  })
})

describe("betRepeat", () => {
  it("invokes the thunk n times in order", () => {
    let i = 0

    expect(betRepeat(4, () => i++)).toEqual([0, 1, 2, 3])
  })
})

describe("betCompose", () => {
  it("evaluates all three and bets among the results", () => {
    const f = vi.fn((x: number) => x + 1)
    const g = vi.fn((x: number) => x * 10)
    const h = vi.fn((x: number) => -x)
    const composed = betCompose(f, g, h)

    const result = withSeed(4, () => composed(3))

    expect(result).toBe(withSeed(4, () => bet(4, 30, -3)))
    expect(f).toHaveBeenCalledOnce()
    expect(g).toHaveBeenCalledOnce()
    expect(h).toHaveBeenCalledOnce()
  })
})

describe("betMap", () => {
  it("keeps length and either maps or keeps each element", () => {
    const xs = Array.from({ length: 50 }, (_, i) => i)
    const result = withSeed(8, () => betMap((x: number) => x + 1000, xs))

    expect(result).toHaveLength(50)
    result.forEach((value, i) => {
      expect([i, i + 1000]).toContain(value)
    })
  })

  it("calls f only for elements where it was chosen", () => {
    const f = vi.fn((x: number) => x + 1000)
    const result = withSeed(8, () => betMap(f, [1, 2, 3, 4, 5, 6]))

    const mapped = result.filter((value) => value >= 1000).length

    expect(f).toHaveBeenCalledTimes(mapped)
  })

  it("uses one draw per element", () => {
    const afterMap = withSeed(2, () => {
      betMap((x: number) => x, [1, 2, 3])
      return draw()
    })
    const afterDraws = withSeed(2, () => {
      draw()
      draw()
      draw()
      return draw()
    })

    expect(afterMap).toBe(afterDraws)
  })
})

describe("betFilter", () => {
  it("returns a subsequence of the input", () => {
    const xs = Array.from({ length: 40 }, (_, i) => i)
    const kept = withSeed(15, () => betFilter((x: number) => x % 2 === 0, xs))

    expect(kept).toEqual([...kept].sort((a, b) => a - b))
    expect(new Set(kept).size).toBe(kept.length)
    for (const x of kept) expect(xs).toContain(x)
  })

  it("favours elements satisfying the predicate", () => {
    const xs = Array.from({ length: 3000 }, (_, i) => i)
    const kept = withSeed(16, () => betFilter((x: number) => x < 1500, xs))

    const passing = kept.filter((x) => x < 1500).length
    const failing = kept.length - passing

    expect(Math.abs(passing - 1000)).toBeLessThan(120)
    expect(Math.abs(failing - 500)).toBeLessThan(120)
  })
})

describe("betUntil", () => {
  it("returns the first accepted value", () => {
    let i = 0

    expect(betUntil((x: number) => x >= 3, () => i++)).toBe(3)
  })

  it("throws iteration_limit_exceeded and warns at the cap", () => {
    const logger = mock<Logger>()
    const thunk = vi.fn(() => 0)

    const err = caught(() => betUntil((x: number) => x > 0, thunk, { maxAttempts: 5, logger }))

    expect(isBetError(err, "iteration_limit_exceeded")).toBe(true)
    expect(thunk).toHaveBeenCalledTimes(5)
    expect(logger.warn).toHaveBeenCalledWith("Predicate not satisfied within attempt cap", {
      module: "bet",
      operation: "betUntil",
      maxAttempts: 5,
    })
  })

  it("rejects a non-positive cap", () => {
    const err = caught(() => betUntil(() => true, () => 1, { maxAttempts: 0 }))

    expect(isBetError(err, "invalid_argument")).toBe(true)
  })

  it("terminates under a seed for a satisfiable predicate", () => {
    const value = withSeed(1, () => betUntil((x: string) => x === "c", () => bet("a", "b", "c")))

    expect(value).toBe("c")
  })
})

describe("betParallel", () => {
  it("matches n sequential bets", () => {
    const parallel = withSeed(30, () => betParallel(5, "a", "b", "c"))
    const sequential = withSeed(30, () => Array.from({ length: 5 }, () => bet("a", "b", "c")))

    expect(parallel).toEqual(sequential)
  })

  it("returns an empty list for n = 0", () => {
    expect(betParallel(0, 1, 2, 3)).toEqual([])
  })
})

describe("estimateProbability", () => {
  it("returns the fraction of accepted trials", () => {
    let i = 0

    expect(estimateProbability(4, () => i++, (x) => x % 2 === 0)).toBe(0.5)
  })

  it("approximates a weighted probability", () => {
    const p = withSeed(99, () =>
      estimateProbability(
        2000,
        () => betWeighted(["hit", 1], ["miss", 1], ["miss", 2]),
        (x) => x === "hit",
      ),
    )

    expect(Math.abs(p - 0.25)).toBeLessThan(0.05)
  })

  it("rejects zero trials", () => {
    expect(isBetError(caught(() => estimateProbability(0, () => 1, () => true)), "invalid_argument")).toBe(true)
  })
})

describe("full pipeline", () => {
  const program = () => ({
    first: bet("a", "b", "c"),
    weighted: betWeighted(["x", 1], ["y", 2], ["z", 3]),
    parallel: betParallel(10, 1, 2, 3),
    estimate: estimateProbability(200, () => bet(1, 2, 3), (x) => x === 1),
    nested: withSeed(7, () => bet("p", "q", "r")),
    last: bet("a", "b", "c"),
  })

  it("reproduces every result under one top-level seed", () => {
    expect(withSeed(12345, program)).toEqual(withSeed(12345, program))
  })

  it("reproduces the documented nested example", () => {
    const run = () => withSeed(100, () => [withSeed(200, () => bet(1, 2, 3)), bet(10, 20, 30)])

    expect(run()).toEqual(run())
  })
})
