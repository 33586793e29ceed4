import { BetError } from "./bet-error"

/**
 * Argument checks shared by every runtime package. Each throws a `BetError`
 * naming `operation` and returns the value unchanged otherwise.
 */

export function requireFinite(operation: string, name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw BetError.invalidArgument(operation, `${name} must be a finite number`, {
      [name]: value,
    })
  }

  return value
}

export function requireCount(operation: string, name: string, value: number, min = 0): number {
  if (!Number.isSafeInteger(value) || value < min) {
    throw BetError.invalidArgument(operation, `${name} must be an integer >= ${min}`, {
      [name]: value,
    })
  }

  return value
}

export function requireProbability(operation: string, name: string, value: number): number {
  if (!(value >= 0 && value <= 1)) {
    throw BetError.invalidArgument(operation, `${name} must be in [0, 1]`, { [name]: value })
  }

  return value
}

export function requireNonEmpty<T>(operation: string, values: readonly T[]): readonly T[] {
  if (values.length === 0) throw BetError.emptyInput(operation)

  return values
}
