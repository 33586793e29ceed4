import { AsyncLocalStorage } from "node:async_hooks"
import { BetError } from "@betlang/errors"
import { createNullLogger, type Logger } from "@betlang/logger"
import { createEntropySeed } from "../adapters/entropy/entropy"
import { SeededRandom } from "../adapters/seeded/seeded-random"
import type { RandomSource } from "../ports/random-source"

type Frame = {
  source: RandomSource
  /** Undefined for entropy-seeded frames. */
  seed: number | undefined
  depth: number
}

export type RandomContextOptions = {
  /** Seed for unseeded roots. Defaults to `createEntropySeed`. */
  entropy?: () => number
  logger?: Logger
}

/**
 * The ambient generator every sampling operation draws from.
 *
 * Frames live in `AsyncLocalStorage`, so a seeded scope follows its body
 * through `await` and concurrent tasks never see each other's scopes. Outside
 * any scope the context lazily creates one process-wide root generator, which
 * every unscoped task shares; `isolate` gives a task a generator of its own.
 */
export class RandomContext {
  private readonly storage = new AsyncLocalStorage<Frame>()
  private readonly entropy: () => number
  private logger: Logger
  private root: Frame | undefined

  constructor(options: RandomContextOptions = {}) {
    this.entropy = options.entropy ?? createEntropySeed
    this.logger = (options.logger ?? createNullLogger()).child({ module: "random" })
  }

  /**
   * Replaces the logger, e.g. to route the process-wide `randomContext`
   * through one built by `createLoggerFromConfig`.
   */
  setLogger(logger: Logger): void {
    this.logger = logger.child({ module: "random" })
  }

  /** Seeded frames enclosing the caller. */
  get depth(): number {
    return this.storage.getStore()?.depth ?? 0
  }

  seeded(): boolean {
    return this.storage.getStore()?.seed !== undefined
  }

  current(): RandomSource {
    return (this.storage.getStore() ?? this.rootFrame()).source
  }

  draw(): number {
    return this.current().next()
  }

  /**
   * Runs `body` against a fresh generator seeded with `seed`. The enclosing
   * generator is neither read nor advanced. A returned promise keeps the
   * seeded generator for its whole continuation.
   */
  withSeed<T>(seed: number, body: () => T): T {
    if (!Number.isSafeInteger(seed)) throw BetError.invalidSeed(seed)

    const depth = this.depth + 1
    const frame: Frame = { source: new SeededRandom(seed), seed, depth }

    this.logger.trace("Entering seeded scope", { operation: "withSeed", seed, depth })
    try {
      return this.storage.run(frame, body)
    } finally {
      this.logger.trace("Leaving seeded scope", { operation: "withSeed", seed, depth })
    }
  }

  /**
   * Runs `body` against its own entropy-seeded generator, detached from any
   * enclosing seeded scope.
   */
  isolate<T>(body: () => T): T {
    const frame: Frame = { source: this.entropySource("isolate"), seed: undefined, depth: 0 }

    return this.storage.run(frame, body)
  }

  private rootFrame(): Frame {
    this.root ??= { source: this.entropySource("root"), seed: undefined, depth: 0 }

    return this.root
  }

  private entropySource(operation: string): RandomSource {
    const source = new SeededRandom(this.entropy())
    this.logger.debug("Initialized generator from entropy", { operation, seed: source.seed })

    return source
  }
}

export const randomContext = new RandomContext()

export function current(): RandomSource {
  return randomContext.current()
}

export function draw(): number {
  return randomContext.draw()
}

export function withSeed<T>(seed: number, body: () => T): T {
  return randomContext.withSeed(seed, body)
}

export function isolate<T>(body: () => T): T {
  return randomContext.isolate(body)
}
