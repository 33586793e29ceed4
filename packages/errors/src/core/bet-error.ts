import { BaseError } from "./base-error"

export type BetErrorCode =
  | "invalid_argument"
  | "empty_input"
  | "length_mismatch"
  | "invalid_seed"
  | "zero_weight_sum"
  | "zero_expected_frequency"
  | "iteration_limit_exceeded"
  | "invalid_config"

/**
 * Every failure the runtime signals. Errors are raised synchronously by the
 * operation that detects them; nothing falls back to a default value.
 *
 * @example
 * ```ts
 * try {
 *   mean([])
 * } catch (err) {
 *   if (isBetError(err, "empty_input")) console.log(err.context.operation)
 * }
 * ```
 */
export class BetError extends BaseError<BetErrorCode> {
  static invalidArgument(
    operation: string,
    message: string,
    context: Record<string, unknown> = {},
  ): BetError {
    return new BetError(`${operation}: ${message}`, {
      code: "invalid_argument",
      context: { operation, ...context },
    })
  }

  static emptyInput(operation: string): BetError {
    return new BetError(`${operation}: input sequence must not be empty`, {
      code: "empty_input",
      context: { operation },
    })
  }

  static lengthMismatch(
    operation: string,
    input: { left: number; right: number },
  ): BetError {
    return new BetError(
      `${operation}: sequences must be non-empty and of equal length (got ${input.left} and ${input.right})`,
      {
        code: "length_mismatch",
        context: { operation, left: input.left, right: input.right },
      },
    )
  }

  static invalidSeed(seed: unknown): BetError {
    return new BetError(`Seed must be a safe integer (got ${String(seed)})`, {
      code: "invalid_seed",
      context: { seed },
    })
  }

  static zeroWeightSum(operation: string, weights: readonly number[]): BetError {
    return new BetError(`${operation}: weights must sum to a positive number`, {
      code: "zero_weight_sum",
      context: { operation, weights: [...weights] },
    })
  }

  static zeroExpectedFrequency(index: number): BetError {
    return new BetError(
      `chiSquareTest: expected frequency at index ${index} is zero`,
      {
        code: "zero_expected_frequency",
        context: { operation: "chiSquareTest", index },
      },
    )
  }

  static iterationLimitExceeded(operation: string, maxAttempts: number): BetError {
    return new BetError(
      `${operation}: predicate not satisfied within ${maxAttempts} attempts`,
      {
        code: "iteration_limit_exceeded",
        context: { operation, maxAttempts },
      },
    )
  }

  static invalidConfig(details: string, keys: readonly string[]): BetError {
    return new BetError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { keys: [...keys] },
    })
  }
}

export function isBetError(err: unknown, code?: BetErrorCode): err is BetError {
  return err instanceof BetError && (code === undefined || err.code === code)
}
