export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors: instance names, file paths,
 * byte counts. Frozen on construction.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed (e.g. a transient EBUSY) */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a missing directory, a full disk),
   * `false` for invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Details carried by errors from `node:fs`.
 */
export type IoErrorDetails = Readonly<{
  /** errno code such as `ENOENT` or `EACCES` */
  errno?: string
  syscall?: string
  path?: string
  dest?: string
}>

/**
 * JSON-safe error shape used when reporting to a diagnostics logger.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  io?: IoErrorDetails
  cause?: SerializedError
  stack?: string
}>
