import { stripPrefix } from "../../core/prefix"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this are read, with the prefix stripped. */
  prefix?: string
  /** Defaults to `process.env`, read at every `load()`. */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.options.env ?? process.env, this.options.prefix)
  }
}
