import fs from "node:fs/promises"
import path from "node:path"
import { hasErrno } from "@rotolog/errors"
import { ConfigSourceError } from "../../core/errors"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Absolute, or relative to `cwd`. The file must hold a single JSON object.
   *
   * @example "rotolog.json"
   */
  file: string

  /** When `false`, a missing file loads as an empty object. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
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

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigSourceError(this.name, "invalid JSON", { cause: err })
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigSourceError(this.name, "top-level value must be an object")
    }

    return parsed
  }
}
