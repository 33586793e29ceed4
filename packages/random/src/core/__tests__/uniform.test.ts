import { isBetError } from "@betlang/errors"
import type { RandomSource } from "../../ports/random-source"
import { uniformInt, uniformReal } from "../uniform"

const fixedRandom = (value: number): RandomSource => ({
  next: () => value,
})

describe("uniformInt", () => {
  it("maps u to floor(u * n)", () => {
    expect(uniformInt(fixedRandom(0), 3)).toBe(0)
    expect(uniformInt(fixedRandom(0.34), 3)).toBe(1)
    expect(uniformInt(fixedRandom(0.999), 3)).toBe(2)
  })

  it("consumes exactly one draw", () => {
    const next = vi.fn(() => 0.5)

    uniformInt({ next }, 10)

    expect(next).toHaveBeenCalledOnce()
  })

  it.each([0, -1, 2.5, Number.NaN])("rejects n = %s", (n) => {
    expect(() => uniformInt(fixedRandom(0.5), n)).toThrow(/uniformInt: n must be a positive integer/)
  })
})

describe("uniformReal", () => {
  it("scales u into [lo, hi)", () => {
    expect(uniformReal(fixedRandom(0), 2, 4)).toBe(2)
    expect(uniformReal(fixedRandom(0.25), 2, 4)).toBe(2.5)
  })

  it("rejects reversed bounds", () => {
    let error: unknown
    try {
      uniformReal(fixedRandom(0.5), 4, 2)
    } catch (err) {
      error = err
    }

    expect(isBetError(error, "invalid_argument")).toBe(true)
  })
})
