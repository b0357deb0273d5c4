import fs from "node:fs/promises"
import path from "node:path"
import { type Clock, SystemClock } from "@rotolog/clock"
import { MemoryLock, withLock } from "@rotolog/lock"
import { createPinoLogger, type Logger } from "@rotolog/logger"
import { RollingFileWriter } from "../../adapters/fs/rolling-file-writer"
import { DirectoryCreationError } from "../../errors/errors"
import type { Level } from "../../ports/level"
import type { LoggerConfig } from "../../ports/logger-config"
import { fileStem, validateLoggerConfig } from "../config/logger-config-schema"
import { type ExitFn, FATAL_EXIT_CODE, InstanceLogger } from "../logger/instance-logger"
import { AsyncRelay } from "../relay/async-relay"
import { SharedWriter } from "../writer/shared-writer"

export type LoggerRegistryDeps = {
  clock: Clock

  /** Diagnostics for registrations, rotation failures and failed log calls. */
  logger: Logger

  /** @default process.exit */
  exit?: ExitFn

  threadTag?: () => number
}

const REGISTRY_KEY = "registry"

/**
 * Named logging instances of one process.
 *
 * Registering a name that is already taken replaces the old instance: its
 * relay is drained and the registry's reference to its file is released
 * before the replacement opens its file.
 * Two instances pointed at the same file are not detected and their
 * rotations will race.
 */
export class LoggerRegistry {
  private readonly instances = new Map<string, InstanceLogger>()
  private readonly lock = new MemoryLock()
  private readonly logger: Logger
  private readonly exit: ExitFn

  constructor(private readonly deps: LoggerRegistryDeps) {
    this.logger = deps.logger.child({ component: "registry" })
    this.exit = deps.exit ?? ((code) => process.exit(code))
  }

  /**
   * Opens the instance's file and registers it under `config.instanceName`.
   *
   * An instance already registered under that name is drained and shut down
   * before the new file is opened, so lines it still had queued are counted
   * by the new writer. If the new file cannot be opened the name is left
   * unregistered. Registrations run one at a time.
   *
   * @returns A clone owned by the caller; release it when done.
   * @throws ConfigurationError, DirectoryCreationError, FileOpenError
   */
  async register(config: LoggerConfig): Promise<InstanceLogger> {
    const valid = validateLoggerConfig(config)
    const name = valid.instanceName

    const owned = await withLock(this.lock, REGISTRY_KEY, async () => {
      const previous = this.instances.get(name)

      if (previous) {
        this.instances.delete(name)
        await previous.shutdown()
        this.logger.debug("replaced instance", { instance: name })
      }

      const created = await this.open(valid)
      this.instances.set(name, created)

      return created.clone()
    })

    this.logger.debug("registered instance", { instance: name, file: owned.activePath })

    return owned
  }

  /**
   * Registers `config` and returns its instance name, for call sites that log
   * by name.
   */
  async initLogger(config: LoggerConfig): Promise<string> {
    const instance = await this.register(config)
    await instance.release()

    return instance.name
  }

  /**
   * @returns The registered instance, or `null` for an unknown name. The
   * registry keeps ownership; clone it to hold on to it.
   */
  resolve(name: string): InstanceLogger | null {
    return this.instances.get(name) ?? null
  }

  has(name: string): boolean {
    return this.instances.has(name)
  }

  names(): string[] {
    return [...this.instances.keys()]
  }

  /** @returns `false` when `name` was not registered. */
  async unregister(name: string): Promise<boolean> {
    const instance = await withLock(this.lock, REGISTRY_KEY, async () => {
      const found = this.instances.get(name)
      this.instances.delete(name)
      return found
    })

    if (!instance) return false

    await instance.shutdown()
    return true
  }

  /** Drains and releases every instance. The registry stays usable. */
  async shutdown(): Promise<void> {
    const all = await withLock(this.lock, REGISTRY_KEY, async () => {
      const taken = [...this.instances.values()]
      this.instances.clear()
      return taken
    })

    await Promise.all(all.map((instance) => instance.shutdown()))
  }

  /**
   * Logs through the instance called `name`. A FATAL line for an unknown name
   * is not written, but the process still exits.
   *
   * @returns Bytes in the line, or `null` when `name` is unknown.
   */
  async log(name: string, level: Level, message: string): Promise<number | null> {
    const instance = this.resolve(name)

    if (!instance) {
      if (level === "FATAL") this.exitUnknown(name)
      return null
    }

    return instance.log(level, message)
  }

  trace(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    return this.resolve(name)?.trace(fmt, ...args) ?? Promise.resolve()
  }

  debug(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    return this.resolve(name)?.debug(fmt, ...args) ?? Promise.resolve()
  }

  info(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    return this.resolve(name)?.info(fmt, ...args) ?? Promise.resolve()
  }

  warn(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    return this.resolve(name)?.warn(fmt, ...args) ?? Promise.resolve()
  }

  error(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    return this.resolve(name)?.error(fmt, ...args) ?? Promise.resolve()
  }

  /** Exits with code 1 even when `name` is unknown. */
  async fatal(name: string, fmt: string, ...args: unknown[]): Promise<void> {
    const instance = this.resolve(name)
    if (!instance) {
      this.exitUnknown(name)
      return
    }

    await instance.fatal(fmt, ...args)
  }

  private async open(config: LoggerConfig): Promise<InstanceLogger> {
    const dir = path.join(config.path, config.subdir)

    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (err) {
      throw new DirectoryCreationError(dir, { cause: err })
    }

    const diagnostics = this.deps.logger.child({ instance: config.instanceName })

    const writer = await RollingFileWriter.open(
      {
        basePath: path.join(dir, fileStem(config.fileName)),
        maxSizeBytes: config.maxSizeBytes,
        maxFiles: config.maxFiles,
        instantFlush: config.instantFlush,
      },
      { logger: diagnostics },
    )

    const handle = SharedWriter.wrap(writer)
    const relay = config.async
      ? new AsyncRelay(
          handle.clone(),
          { capacity: config.queueCapacity, overflowPolicy: config.overflowPolicy },
          { logger: diagnostics },
        )
      : null

    return new InstanceLogger(config, handle, relay, this.deps)
  }

  private exitUnknown(name: string): void {
    this.logger.error("fatal call for unknown instance", { instance: name })
    this.exit(FATAL_EXIT_CODE)
  }
}

/**
 * Registry with a system clock and a pino diagnostics logger on stderr unless
 * told otherwise.
 */
export function createLoggerRegistry(deps: Partial<LoggerRegistryDeps> = {}): LoggerRegistry {
  return new LoggerRegistry({
    ...deps,
    clock: deps.clock ?? new SystemClock(),
    logger: deps.logger ?? createPinoLogger({}, { level: "info" }),
  })
}
