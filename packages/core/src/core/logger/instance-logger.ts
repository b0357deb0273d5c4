import { format } from "node:util"
import type { Clock } from "@rotolog/clock"
import type { Logger } from "@rotolog/logger"
import { RelayClosedError } from "../../errors/errors"
import type { Level } from "../../ports/level"
import type { LoggerConfig } from "../../ports/logger-config"
import { LineFormatter } from "../format/line-formatter"
import type { AsyncRelay } from "../relay/async-relay"
import type { SharedWriter } from "../writer/shared-writer"

export type ExitFn = (code: number) => void

export type InstanceLoggerDeps = {
  clock: Clock

  /** Diagnostics: failed log calls are reported here. */
  logger: Logger

  /** Called with 1 after a FATAL line. @default process.exit */
  exit?: ExitFn

  /** @default the calling thread's tag */
  threadTag?: () => number
}

export const FATAL_EXIT_CODE = 1

/**
 * A named logging instance bound to one rolling file.
 *
 * `log()` exposes the outcome of each write; the leveled methods format their
 * arguments with `util.format`, never reject and report failures to the
 * diagnostics logger instead.
 *
 * Each clone shares the file and relay and owns one reference to the writer,
 * so it must be released (or shut down) once.
 */
export class InstanceLogger {
  private readonly formatter: LineFormatter
  private readonly diagnostics: Logger
  private readonly exit: ExitFn

  constructor(
    readonly config: LoggerConfig,
    private readonly handle: SharedWriter,
    private readonly relay: AsyncRelay | null,
    private readonly deps: InstanceLoggerDeps,
  ) {
    this.formatter = new LineFormatter(
      { clock: deps.clock, threadTag: deps.threadTag },
      config.timeZone,
    )
    this.diagnostics = deps.logger.child({ instance: config.instanceName })
    this.exit = deps.exit ?? ((code) => process.exit(code))
  }

  get name(): string {
    return this.config.instanceName
  }

  get activePath(): string {
    return this.handle.activePath
  }

  get isAsync(): boolean {
    return this.relay !== null
  }

  /** Owners of the underlying writer, this logger included. */
  get refCount(): number {
    return this.handle.refCount
  }

  /**
   * Writes one line. In async mode the line is queued and the promise settles
   * once it is accepted; once the relay is shut down lines go straight to the
   * file.
   *
   * @returns Bytes in the rendered line.
   * @throws WriteError, RelayFullError, HandleReleasedError
   */
  async log(level: Level, message: string): Promise<number> {
    const line = Buffer.from(this.formatter.format(level, message), "utf8")

    if (level === "FATAL") return this.logFatal(line)

    await this.submit(line)
    return line.byteLength
  }

  trace(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("TRACE", fmt, args)
  }

  debug(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("DEBUG", fmt, args)
  }

  info(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("INFO", fmt, args)
  }

  warn(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("WARN", fmt, args)
  }

  error(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("ERROR", fmt, args)
  }

  /** Writes the line, then exits the process with code 1. */
  fatal(fmt: string, ...args: unknown[]): Promise<void> {
    return this.emit("FATAL", fmt, args)
  }

  /** Waits for queued lines, then syncs the file. */
  async flush(): Promise<void> {
    await this.relay?.drain()
    await this.handle.flush()
  }

  /** Forces a rotation of the shared file. */
  rotate(): Promise<boolean> {
    return this.handle.rotate()
  }

  /** Another owner of the same file and relay. */
  clone(): InstanceLogger {
    return new InstanceLogger(this.config, this.handle.clone(), this.relay, this.deps)
  }

  /** Drops this logger's reference to the file. Idempotent. */
  release(): Promise<void> {
    return this.handle.release()
  }

  /**
   * Drains and stops the relay shared by every clone, then releases this
   * logger's reference. Clones keep writing synchronously.
   */
  async shutdown(): Promise<void> {
    await this.relay?.shutdown()
    await this.handle.release()
  }

  private async submit(line: Uint8Array): Promise<void> {
    if (this.relay) {
      try {
        await this.relay.enqueue(line)
        return
      } catch (err) {
        if (!(err instanceof RelayClosedError)) throw err
      }
    }

    await this.handle.writeAll(line)
  }

  private async logFatal(line: Uint8Array): Promise<number> {
    let written = 0

    try {
      await this.relay?.drain()
      await this.handle.writeAll(line)
      await this.handle.flush()
      written = line.byteLength
    } catch (err) {
      this.diagnostics.error("fatal line could not be written", { err })
    }

    this.exit(FATAL_EXIT_CODE)
    return written
  }

  private async emit(level: Level, fmt: string, args: unknown[]): Promise<void> {
    try {
      await this.log(level, format(fmt, ...args))
    } catch (err) {
      this.diagnostics.error("log call failed", { severity: level, err })
    }
  }
}
