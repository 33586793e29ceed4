import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs; JSON lines otherwise.
   */
  prettify?: boolean
}
