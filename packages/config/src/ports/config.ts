/**
 * Validated configuration with per-key provenance.
 *
 * @example
 * ```ts
 * const config = await loadRuntimeConfig()
 *
 * config.get("LOG_LEVEL")  // "info"
 * config.explain("SEED")   // "env:BET_"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or
   * "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Distinct provenance labels in first-applied order.
   */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know about. Usually a
   * typo such as `BET_SEEED`.
   */
  unknownKeys(): string[]
}
