import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    this.data = Object.freeze({ ...data })
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  unknownKeys(): string[] {
    const known = new Set(this.keys())

    return [...this.providedKeys].filter((key) => !known.has(key))
  }
}
