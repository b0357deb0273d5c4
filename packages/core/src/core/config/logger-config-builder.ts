import path from "node:path"
import type { LoggerConfig, OverflowPolicy, TimeZone } from "../../ports/logger-config"
import { DEFAULT_RELAY_CAPACITY } from "../relay/async-relay"

type MutableLoggerConfig = { -readonly [K in keyof LoggerConfig]: LoggerConfig[K] }

const MiB = 1024 * 1024

/** Name of the running script without its extension, or `"unknown"`. */
export function processName(argv: readonly string[] = process.argv): string {
  const script = argv[1]
  if (!script) return "unknown"

  return path.parse(script).name || "unknown"
}

export function defaultLoggerConfig(): LoggerConfig {
  return Object.freeze({
    path: "logs/",
    fileName: "record",
    subdir: processName(),
    maxSizeBytes: 20 * MiB,
    maxFiles: 5,
    async: false,
    queueCapacity: DEFAULT_RELAY_CAPACITY,
    overflowPolicy: "block",
    instantFlush: false,
    instanceName: "default",
    timeZone: "local",
  })
}

/**
 * Fluent builder for `LoggerConfig`. Values are checked when the config is
 * registered, not here.
 *
 * @example
 * ```typescript
 * const config = new LoggerConfigBuilder()
 *   .withPath("/var/log/myapp")
 *   .withFileName("billing")
 *   .withMaxSize(5 * 1024 * 1024)
 *   .withInstanceName("billing")
 *   .build()
 * ```
 */
export class LoggerConfigBuilder {
  private readonly config: MutableLoggerConfig

  constructor(base: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultLoggerConfig(), ...base }
  }

  withPath(dir: string): this {
    this.config.path = dir
    return this
  }

  /** `app` and `app.log` both give `app.log`, `app.1.log`, … */
  withFileName(fileName: string): this {
    this.config.fileName = fileName
    return this
  }

  /** Pass `""` to write directly into `path`. */
  withSubdir(subdir: string): this {
    this.config.subdir = subdir
    return this
  }

  withMaxSize(bytes: number): this {
    this.config.maxSizeBytes = bytes
    return this
  }

  withMaxFiles(count: number): this {
    this.config.maxFiles = count
    return this
  }

  withAsync(enabled = true): this {
    this.config.async = enabled
    return this
  }

  withQueueCapacity(capacity: number): this {
    this.config.queueCapacity = capacity
    return this
  }

  withOverflowPolicy(policy: OverflowPolicy): this {
    this.config.overflowPolicy = policy
    return this
  }

  withInstantFlush(enabled = true): this {
    this.config.instantFlush = enabled
    return this
  }

  withInstanceName(name: string): this {
    this.config.instanceName = name
    return this
  }

  withTimeZone(zone: TimeZone): this {
    this.config.timeZone = zone
    return this
  }

  build(): LoggerConfig {
    return Object.freeze({ ...this.config })
  }
}
