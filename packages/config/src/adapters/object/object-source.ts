import type { ConfigSource } from "../../ports/source"

/**
 * Fixed values supplied in code, typically last in the list to override
 * everything loaded from the environment.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
