import { BaseError, type ErrorContext, ioErrorDetails } from "@rotolog/errors"

export type LoggingErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

function withIo(options: LoggingErrorOptions): ErrorContext {
  const io = ioErrorDetails(options.cause)

  return { ...options.context, ...(io && { io }) }
}

export class ConfigurationError extends BaseError<"configuration_invalid"> {
  constructor(message: string, options: LoggingErrorOptions = {}) {
    super(message, {
      code: "configuration_invalid",
      context: options.context,
      cause: options.cause,
      isOperational: false,
    })
  }
}

export class DirectoryCreationError extends BaseError<"directory_creation_failed"> {
  constructor(dir: string, options: LoggingErrorOptions = {}) {
    super(`Cannot create log directory ${dir}`, {
      code: "directory_creation_failed",
      context: withIo({ ...options, context: { dir, ...options.context } }),
      cause: options.cause,
    })
  }
}

export class FileOpenError extends BaseError<"file_open_failed"> {
  constructor(file: string, options: LoggingErrorOptions = {}) {
    super(`Cannot open log file ${file}`, {
      code: "file_open_failed",
      context: withIo({ ...options, context: { file, ...options.context } }),
      cause: options.cause,
    })
  }
}

export class RotationError extends BaseError<"rotation_failed"> {
  constructor(file: string, options: LoggingErrorOptions = {}) {
    super(`Rotation of ${file} failed`, {
      code: "rotation_failed",
      context: withIo({ ...options, context: { file, ...options.context } }),
      cause: options.cause,
    })
  }
}

export class WriteError extends BaseError<"write_failed"> {
  constructor(file: string, reason: string, options: LoggingErrorOptions = {}) {
    super(`Write to ${file} failed: ${reason}`, {
      code: "write_failed",
      context: withIo({ ...options, context: { file, ...options.context } }),
      cause: options.cause,
    })
  }
}

export class HandleReleasedError extends BaseError<"handle_released"> {
  constructor(file: string) {
    super(`Writer handle for ${file} was already released`, {
      code: "handle_released",
      context: { file },
      isOperational: false,
    })
  }
}

export class RelayFullError extends BaseError<"relay_full"> {
  constructor(capacity: number) {
    super(`Relay queue is full (capacity ${capacity})`, {
      code: "relay_full",
      context: { capacity },
      isRetryable: true,
    })
  }
}

export class RelayClosedError extends BaseError<"relay_closed"> {
  constructor() {
    super("Relay is shut down", { code: "relay_closed" })
  }
}
