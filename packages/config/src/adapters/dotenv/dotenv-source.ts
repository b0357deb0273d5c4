import fs from "node:fs/promises"
import path from "node:path"
import { hasErrno } from "@rotolog/errors"
import { parse } from "dotenv"
import { ConfigSourceError } from "../../core/errors"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /** When `false`, a missing file loads as an empty object. */
  required: boolean

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
      if (!this.opts.required && hasErrno(err, "ENOENT")) return {}

      throw new ConfigSourceError(this.name, `cannot read ${filePath}`, { cause: err })
    }

    return parse(content)
  }
}
