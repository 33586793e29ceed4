export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export {
  createLoggerFromConfig,
  type LoadRuntimeConfigOptions,
  loadRuntimeConfig,
  RUNTIME_ENV_PREFIX,
  type RuntimeConfig,
  runtimeConfigSchema,
} from "./core/runtime-config"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
