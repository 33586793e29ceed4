export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { BetError, type BetErrorCode, isBetError } from "./core/bet-error"
export { requireCount, requireFinite, requireNonEmpty, requireProbability } from "./core/guards"
export type { ErrorCode, ErrorContext, RuntimeError, SerializedError } from "./ports/error"
