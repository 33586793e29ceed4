/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion, validation and defaults belong to the zod
 * schema handed to `loadConfig`. Sources are applied in order and later
 * sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label reported by `IConfig.explain`.
   * Example: "env:BET_", "dotenv:.env", "object:overrides"
   */
  readonly name: string

  /**
   * Returns a fresh object on every call. A key mapped to `undefined` counts
   * as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
