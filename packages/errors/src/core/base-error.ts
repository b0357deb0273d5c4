import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { ioErrorDetails } from "./utils/io-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Turns any thrown value into a JSON-safe shape, following `cause` chains.
 *
 * Errors that are not a `BaseError` get code `"unknown"` and count as
 * non-operational. Filesystem errors keep their errno details under `io`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const io = err instanceof BaseError ? undefined : ioErrorDetails(err)
  const cause = err.cause === undefined ? undefined : serializeError(err.cause, options)
  const stack = options.includeStack ? err.stack : undefined

  return {
    name: err.name,
    message: err.message,
    ...(err instanceof BaseError
      ? {
          code: err.code,
          context: { ...err.context },
          isOperational: err.isOperational,
          timestamp: err.timestamp.toISOString(),
        }
      : {
          code: "unknown",
          context: {},
          isOperational: false,
          timestamp: new Date().toISOString(),
        }),
    ...(io && { io }),
    ...(cause && { cause }),
    ...(stack && { stack }),
  }
}
