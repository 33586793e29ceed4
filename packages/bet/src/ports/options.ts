import type { Logger } from "@betlang/logger"

export type BetUntilOptions = {
  /**
   * Give up after this many invocations of the thunk. Without it `betUntil`
   * loops until the predicate holds.
   */
  maxAttempts?: number

  /** Receives a warning when `maxAttempts` is exhausted. */
  logger?: Logger
}
