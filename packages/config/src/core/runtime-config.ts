import { createPinoLogger, type Logger, logLevelNames } from "@betlang/logger"
import { z } from "zod"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { ObjectSource } from "../adapters/object/object-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { loadConfig } from "./load"

export const RUNTIME_ENV_PREFIX = "BET_"

export const runtimeConfigSchema = z.object({
  // String seeds must be integer literals, so an empty `BET_SEED=` is rejected.
  SEED: z
    .union([
      z.number(),
      z
        .string()
        .regex(/^[+-]?\d+$/, { message: "SEED must be an integer" })
        .transform(Number),
    ])
    .pipe(z.number().int().refine(Number.isSafeInteger, { message: "SEED must be a safe integer" }))
    .optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

export type LoadRuntimeConfigOptions = {
  /** Directory holding the optional `.env` file. */
  cwd?: string
  env?: Readonly<Record<string, string | undefined>>
  /** Applied after the environment, unprefixed. */
  overrides?: Readonly<Record<string, unknown>>
}

/**
 * Reads `BET_SEED`, `BET_LOG_LEVEL` and `BET_LOG_PRETTY` from an optional
 * `.env` file and then the environment, which wins.
 */
export function loadRuntimeConfig(
  options: LoadRuntimeConfigOptions = {},
): Promise<IConfig<RuntimeConfig>> {
  const sources: ConfigSource[] = [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: RUNTIME_ENV_PREFIX,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    }),
    new EnvSource({
      prefix: RUNTIME_ENV_PREFIX,
      ...(options.env !== undefined && { env: options.env }),
    }),
  ]

  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  return loadConfig({ schema: runtimeConfigSchema, sources })
}

export function createLoggerFromConfig(config: IConfig<RuntimeConfig>): Logger {
  return createPinoLogger(
    {},
    { level: config.get("LOG_LEVEL"), prettify: config.get("LOG_PRETTY") },
    { service: "betlang" },
  )
}
