import type { IConfig, RuntimeConfig } from "@betlang/config"
import { type RandomContext, randomContext } from "./random-context"

/**
 * Runs `body` under `withSeed(SEED)` when the runtime config sets one and
 * directly otherwise.
 */
export function withConfiguredSeed<T>(
  config: IConfig<RuntimeConfig>,
  body: () => T,
  context: RandomContext = randomContext,
): T {
  const seed = config.get("SEED")

  return seed === undefined ? body() : context.withSeed(seed, body)
}
