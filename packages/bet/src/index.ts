export {
  betChain,
  betCompose,
  betFilter,
  betMap,
  betParallel,
  betRepeat,
  betUntil,
  estimateProbability,
} from "./core/compose"
export {
  bet,
  betCategorical,
  betConditional,
  betLazy,
  betTernary,
  betWeighted,
  makeGenerator,
} from "./core/select"
export type { BetUntilOptions } from "./ports/options"
export type {
  BetGenerator,
  TernaryValue,
  Thunk,
  WeightedEntry,
  WeightedOutcome,
} from "./ports/outcome"
