/**
 * Fields the logging core attaches to its own diagnostics.
 */
export type LogContext = {
  /** Registry instance name */
  instance: string

  /** Path of the file being written, rotated or opened */
  file: string

  /** Operation that produced the entry, e.g. "rotate" or "register" */
  operation: string

  component: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
