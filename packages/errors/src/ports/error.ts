export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the offending arguments,
 * lengths, seeds and so on.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface RuntimeError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by bad input (empty samples,
   * a non-integer seed), `false` for invariant violations inside the runtime.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON.stringify-safe error shape, suitable for log payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
