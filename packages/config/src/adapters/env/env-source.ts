import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with `prefix` are read, with the prefix removed
   * from the key (`ROTOLOG_MAX_FILES` → `MAX_FILES`).
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const { prefix } = this
    if (!prefix) return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(prefix) && key.length > prefix.length) {
        filtered[key.slice(prefix.length)] = value
      }
    }

    return filtered
  }
}
