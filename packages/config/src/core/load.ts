import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order and validate the result against `schema`. Keys
 * the schema does not know are dropped.
 *
 * @throws ConfigValidationError when the merged values do not satisfy `schema`
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error), { cause: result.error })
  }

  return new Config<T>(result.data)
}
