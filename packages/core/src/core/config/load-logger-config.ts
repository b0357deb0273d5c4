import {
  type ConfigSource,
  ConfigValidationError,
  EnvSource,
  loadConfig,
} from "@rotolog/config"
import { z } from "zod"
import { ConfigurationError } from "../../errors/errors"
import type { LoggerConfig } from "../../ports/logger-config"
import { LoggerConfigBuilder } from "./logger-config-builder"

export const DEFAULT_ENV_PREFIX = "ROTOLOG_"

const flag = z.union([z.boolean(), z.stringbool()])

const count = z.coerce.number().int()

const loggerEnvSchema = z.object({
  PATH: z.string().min(1).optional(),
  FILE_NAME: z.string().min(1).optional(),
  SUBDIR: z.string().optional(),
  MAX_SIZE: count.positive().optional(),
  MAX_FILES: count.min(1).optional(),
  ASYNC: flag.optional(),
  QUEUE_CAPACITY: count.positive().optional(),
  OVERFLOW_POLICY: z.enum(["block", "drop-oldest", "error"]).optional(),
  INSTANT_FLUSH: flag.optional(),
  INSTANCE_NAME: z.string().min(1).optional(),
  TIME_ZONE: z.enum(["local", "utc"]).optional(),
})

export type LoggerEnv = z.infer<typeof loggerEnvSchema>

export type LoadLoggerConfigOptions = {
  /**
   * Applied in order, later ones win.
   *
   * @default [new EnvSource({ prefix })]
   */
  sources?: ConfigSource[]

  /** Only used for the default source. @default "ROTOLOG_" */
  prefix?: string

  /** Values the sources do not set. Builder defaults fill the rest. */
  defaults?: Partial<LoggerConfig>
}

/**
 * Reads a `LoggerConfig` from the environment, dotenv or JSON files.
 *
 * Keys are `PATH`, `FILE_NAME`, `SUBDIR`, `MAX_SIZE`, `MAX_FILES`, `ASYNC`,
 * `QUEUE_CAPACITY`, `OVERFLOW_POLICY`, `INSTANT_FLUSH`, `INSTANCE_NAME` and
 * `TIME_ZONE`; environment variables carry the prefix (`ROTOLOG_MAX_FILES`).
 *
 * @throws ConfigurationError when a value does not parse
 */
export async function loadLoggerConfig(
  options: LoadLoggerConfigOptions = {},
): Promise<LoggerConfig> {
  const sources = options.sources ?? [
    new EnvSource({ prefix: options.prefix ?? DEFAULT_ENV_PREFIX }),
  ]

  let env: LoggerEnv
  try {
    env = (await loadConfig({ schema: loggerEnvSchema, sources })).value
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      throw new ConfigurationError(err.message, { cause: err })
    }
    throw err
  }

  const builder = new LoggerConfigBuilder(options.defaults)

  if (env.PATH !== undefined) builder.withPath(env.PATH)
  if (env.FILE_NAME !== undefined) builder.withFileName(env.FILE_NAME)
  if (env.SUBDIR !== undefined) builder.withSubdir(env.SUBDIR)
  if (env.MAX_SIZE !== undefined) builder.withMaxSize(env.MAX_SIZE)
  if (env.MAX_FILES !== undefined) builder.withMaxFiles(env.MAX_FILES)
  if (env.ASYNC !== undefined) builder.withAsync(env.ASYNC)
  if (env.QUEUE_CAPACITY !== undefined) builder.withQueueCapacity(env.QUEUE_CAPACITY)
  if (env.OVERFLOW_POLICY !== undefined) builder.withOverflowPolicy(env.OVERFLOW_POLICY)
  if (env.INSTANT_FLUSH !== undefined) builder.withInstantFlush(env.INSTANT_FLUSH)
  if (env.INSTANCE_NAME !== undefined) builder.withInstanceName(env.INSTANCE_NAME)
  if (env.TIME_ZONE !== undefined) builder.withTimeZone(env.TIME_ZONE)

  return builder.build()
}
