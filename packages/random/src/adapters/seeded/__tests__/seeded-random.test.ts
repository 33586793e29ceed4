import { isBetError } from "@betlang/errors"
import { mixSeed, SeededRandom } from "../seeded-random"

const take = (source: SeededRandom, n: number): number[] =>
  Array.from({ length: n }, () => source.next())

describe("SeededRandom", () => {
  it("returns numbers in [0, 1)", () => {
    const source = new SeededRandom(123)

    for (const value of take(source, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it("replays the same sequence for the same seed", () => {
    expect(take(new SeededRandom(42), 20)).toEqual(take(new SeededRandom(42), 20))
  })

  it("diverges for different seeds", () => {
    expect(take(new SeededRandom(1), 5)).not.toEqual(take(new SeededRandom(2), 5))
  })

  it("counts draws in position", () => {
    const source = new SeededRandom(0)
    take(source, 7)

    expect(source.position).toBe(7)
    expect(source.seed).toBe(0)
  })

  it("accepts negative and large safe integers", () => {
    expect(() => new SeededRandom(-5)).not.toThrow()
    expect(() => new SeededRandom(Number.MAX_SAFE_INTEGER)).not.toThrow()
  })

  it.each([1.5, Number.NaN, Number.POSITIVE_INFINITY, 2 ** 53])(
    "rejects seed %s",
    (seed) => {
      let error: unknown
      try {
        new SeededRandom(seed)
      } catch (err) {
        error = err
      }

      expect(isBetError(error, "invalid_seed")).toBe(true)
    },
  )
})

describe("mixSeed", () => {
  it("is the identity on small non-negative 32-bit seeds", () => {
    expect(mixSeed(0)).toBe(0)
    expect(mixSeed(12345)).toBe(12345)
  })

  it("separates seeds that share their low 32 bits", () => {
    expect(mixSeed(2 ** 32 + 1)).not.toBe(mixSeed(1))
  })
})
