import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every diagnostics adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable output instead of one JSON object per line. For local
   * development only.
   */
  prettify?: boolean
}
