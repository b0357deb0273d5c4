/**
 * What an async relay does when its queue is full.
 *
 * - `block`: the log call waits for space
 * - `drop-oldest`: the oldest queued line is discarded and counted
 * - `error`: the log call rejects with `RelayFullError`
 */
export type OverflowPolicy = "block" | "drop-oldest" | "error"

/** Zone of the line timestamps. `local` falls back to UTC when unresolvable. */
export type TimeZone = "local" | "utc"

/**
 * Immutable configuration of one logging instance. Build it with
 * `LoggerConfigBuilder` or `loadLoggerConfig`.
 */
export type LoggerConfig = Readonly<{
  /** Base directory. */
  path: string

  /** Stem of the file names; a trailing `.log` is dropped. */
  fileName: string

  /** Directory under `path`, the process name by default. Empty for none. */
  subdir: string

  /** Size at which the active file is rotated. */
  maxSizeBytes: number

  /** Files kept, the active one included. */
  maxFiles: number

  async: boolean
  queueCapacity: number
  overflowPolicy: OverflowPolicy

  /** Sync to storage after every write. */
  instantFlush: boolean

  /** Registry key. */
  instanceName: string

  timeZone: TimeZone
}>
