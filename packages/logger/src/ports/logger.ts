import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

/**
 * Structured diagnostics logger used by the logging core to report on itself
 * (rotation failures, swallowed write errors, dropped lines).
 */
export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a logger that adds `context` to every entry. The parent is not
   * modified; on key conflicts the child's value wins.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
