import { BaseError } from "@rotolog/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(
    readonly details: string,
    options: { cause?: unknown } = {},
  ) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { details },
      cause: options.cause,
    })
  }
}

export class ConfigSourceError extends BaseError<"config_source_failed"> {
  constructor(source: string, message: string, options: { cause?: unknown } = {}) {
    super(`Config source ${source} failed: ${message}`, {
      code: "config_source_failed",
      context: { source },
      cause: options.cause,
    })
  }
}
