import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { stripPrefix } from "../../core/prefix"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** When false a missing file loads as `{}`. Other read errors still throw. */
  required: boolean

  /** Same meaning as `EnvSourceOptions.prefix`. */
  prefix?: string

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    return stripPrefix(parse(content), this.opts.prefix)
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
