import { BaseError } from "../base-error"
import { BetError, isBetError } from "../bet-error"

describe("BetError", () => {
  it("is a BaseError", () => {
    const err = BetError.emptyInput("mean")

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("BetError")
  })

  it("invalidArgument prefixes the operation and merges context", () => {
    const err = BetError.invalidArgument("binomial", "p must be in [0, 1]", { p: 2 })

    expect(err.code).toBe("invalid_argument")
    expect(err.message).toBe("binomial: p must be in [0, 1]")
    expect(err.context).toEqual({ operation: "binomial", p: 2 })
  })

  it("emptyInput names the operation", () => {
    const err = BetError.emptyInput("median")

    expect(err.code).toBe("empty_input")
    expect(err.message).toBe("median: input sequence must not be empty")
  })

  it("lengthMismatch records both lengths", () => {
    const err = BetError.lengthMismatch("correlation", { left: 3, right: 4 })

    expect(err.code).toBe("length_mismatch")
    expect(err.context).toEqual({ operation: "correlation", left: 3, right: 4 })
  })

  it("invalidSeed records the seed", () => {
    const err = BetError.invalidSeed(1.5)

    expect(err.code).toBe("invalid_seed")
    expect(err.message).toBe("Seed must be a safe integer (got 1.5)")
    expect(err.context).toEqual({ seed: 1.5 })
  })

  it("zeroWeightSum copies the weights", () => {
    const weights = [0, 0, 0]
    const err = BetError.zeroWeightSum("betWeighted", weights)

    expect(err.code).toBe("zero_weight_sum")
    expect(err.context.weights).toEqual([0, 0, 0])
    expect(err.context.weights).not.toBe(weights)
  })

  it("zeroExpectedFrequency records the index", () => {
    const err = BetError.zeroExpectedFrequency(2)

    expect(err.code).toBe("zero_expected_frequency")
    expect(err.context).toEqual({ operation: "chiSquareTest", index: 2 })
  })

  it("iterationLimitExceeded records the cap", () => {
    const err = BetError.iterationLimitExceeded("betUntil", 10)

    expect(err.code).toBe("iteration_limit_exceeded")
    expect(err.message).toBe("betUntil: predicate not satisfied within 10 attempts")
  })

  it("invalidConfig prefixes the details and copies the keys", () => {
    const keys = ["SEED"]
    const err = BetError.invalidConfig("✖ bad seed", keys)

    expect(err.code).toBe("invalid_config")
    expect(err.message).toBe("Configuration validation failed:\n✖ bad seed")
    expect(err.context.keys).toEqual(["SEED"])
    expect(err.context.keys).not.toBe(keys)
  })
})

describe("isBetError", () => {
  it("matches any BetError without a code", () => {
    expect(isBetError(BetError.emptyInput("mean"))).toBe(true)
  })

  it("matches on code when given", () => {
    const err = BetError.emptyInput("mean")

    expect(isBetError(err, "empty_input")).toBe(true)
    expect(isBetError(err, "invalid_seed")).toBe(false)
  })

  it("rejects other errors and values", () => {
    expect(isBetError(new BaseError("x", { code: "empty_input" }))).toBe(false)
    expect(isBetError(new Error("x"))).toBe(false)
    expect(isBetError(undefined)).toBe(false)
  })
})
