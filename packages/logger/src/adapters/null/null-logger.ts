import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/** Drops every entry. For embedders that want no diagnostics at all. */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace = discard<TContext>
  readonly debug = discard<TContext>
  readonly info = discard<TContext>
  readonly warn = discard<TContext>
  readonly error = discard<TContext>
  readonly fatal = discard<TContext>

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

function discard<TContext extends LogContext>(_message: string, _meta?: LogMeta<TContext>): void {}
