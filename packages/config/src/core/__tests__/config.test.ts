import { Config } from "../config"

describe("Config", () => {
  const data = { SEED: 42, LOG_LEVEL: "info", LOG_PRETTY: false }
  const provenance = { SEED: "env:BET_", LOG_LEVEL: "default", LOG_PRETTY: "dotenv:.env" }
  const config = new Config(data, provenance, new Set(["SEED", "LOG_PRETTY", "SEEED"]))

  it("get returns the validated value with its type", () => {
    const seed: number = config.get("SEED")

    expect(seed).toBe(42)
    expect(config.get("LOG_LEVEL")).toBe("info")
  })

  it("keys lists schema keys only", () => {
    expect(config.keys()).toEqual(["SEED", "LOG_LEVEL", "LOG_PRETTY"])
  })

  it("explain reports the supplying source", () => {
    expect(config.explain("SEED")).toBe("env:BET_")
    expect(config.explain("LOG_PRETTY")).toBe("dotenv:.env")
    expect(config.explain("LOG_LEVEL")).toBe("default")
  })

  it("explain falls back to default for keys without provenance", () => {
    const bare = new Config({ SEED: 1 }, {}, new Set())

    expect(bare.explain("SEED")).toBe("default")
  })

  it("sourcesUsed lists distinct labels in order", () => {
    expect(config.sourcesUsed()).toEqual(["env:BET_", "default", "dotenv:.env"])
  })

  it("unknownKeys reports provided keys the schema dropped", () => {
    expect(config.unknownKeys()).toEqual(["SEEED"])
  })

  it("value is frozen and detached from the input", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
    expect(config.value).not.toBe(data)
  })
})
