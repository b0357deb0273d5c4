import { z } from "zod"
import { ConfigurationError } from "../../errors/errors"
import type { LoggerConfig } from "../../ports/logger-config"

/** `app.log` → `app`; any other name is kept. */
export function fileStem(fileName: string): string {
  return fileName.endsWith(".log") ? fileName.slice(0, -".log".length) : fileName
}

const fileNameSchema = z
  .string()
  .refine((v) => !/[\\/]/.test(v), "must be a file name, not a path")
  .refine((v) => fileStem(v).length > 0, "must not be empty")

export const loggerConfigSchema: z.ZodType<LoggerConfig> = z.object({
  path: z.string().min(1),
  fileName: fileNameSchema,
  subdir: z.string(),
  maxSizeBytes: z.number().int().positive(),
  maxFiles: z.number().int().min(1),
  async: z.boolean(),
  queueCapacity: z.number().int().positive(),
  overflowPolicy: z.enum(["block", "drop-oldest", "error"]),
  instantFlush: z.boolean(),
  instanceName: z.string().min(1),
  timeZone: z.enum(["local", "utc"]),
})

/**
 * @throws ConfigurationError listing every invalid field
 */
export function validateLoggerConfig(config: LoggerConfig): LoggerConfig {
  const result = loggerConfigSchema.safeParse(config)

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid logger configuration:\n${z.prettifyError(result.error)}`,
      { context: { instanceName: config.instanceName }, cause: result.error },
    )
  }

  return Object.freeze(result.data)
}
