import { isBetError } from "../bet-error"
import { requireCount, requireFinite, requireNonEmpty, requireProbability } from "../guards"

const caught = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe("guards", () => {
  it("requireFinite passes finite numbers through", () => {
    expect(requireFinite("normal", "mu", -2.5)).toBe(-2.5)
  })

  it("requireFinite rejects NaN and infinities", () => {
    const err = caught(() => requireFinite("normal", "mu", Number.NaN))

    expect(isBetError(err, "invalid_argument")).toBe(true)
    if (!isBetError(err)) return
    expect(err.message).toBe("normal: mu must be a finite number")
    expect(err.context).toEqual({ operation: "normal", mu: Number.NaN })
    expect(() => requireFinite("normal", "mu", Number.NEGATIVE_INFINITY)).toThrow()
  })

  it("requireCount enforces integers at or above the minimum", () => {
    expect(requireCount("betChain", "n", 0)).toBe(0)
    expect(() => requireCount("betChain", "n", -1)).toThrow("betChain: n must be an integer >= 0")
    expect(() => requireCount("betChain", "n", 1.5)).toThrow()
    expect(() => requireCount("movingAverage", "window", 0, 1)).toThrow(
      "movingAverage: window must be an integer >= 1",
    )
  })

  it("requireProbability accepts the closed unit interval", () => {
    expect(requireProbability("binomial", "p", 0)).toBe(0)
    expect(requireProbability("binomial", "p", 1)).toBe(1)
    expect(() => requireProbability("binomial", "p", 1.01)).toThrow("binomial: p must be in [0, 1]")
    expect(() => requireProbability("binomial", "p", Number.NaN)).toThrow()
  })

  it("requireNonEmpty raises empty_input", () => {
    expect(requireNonEmpty("mean", [1])).toEqual([1])
    expect(isBetError(caught(() => requireNonEmpty("mean", [])), "empty_input")).toBe(true)
  })
})
