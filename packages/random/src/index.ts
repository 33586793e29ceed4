export { createEntropySeed } from "./adapters/entropy/entropy"
export { mixSeed, SeededRandom } from "./adapters/seeded/seeded-random"
export { withConfiguredSeed } from "./core/configured-seed"
export {
  current,
  draw,
  isolate,
  RandomContext,
  type RandomContextOptions,
  randomContext,
  withSeed,
} from "./core/random-context"
export { uniformInt, uniformReal } from "./core/uniform"
export type { RandomSource, SeededSource } from "./ports/random-source"
