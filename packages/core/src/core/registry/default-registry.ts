import type { Level } from "../../ports/level"
import type { LoggerConfig } from "../../ports/logger-config"
import { createLoggerRegistry, type LoggerRegistry } from "./logger-registry"

let defaultRegistry: LoggerRegistry | undefined

/**
 * The process-wide registry behind the module-level functions, created on
 * first use.
 */
export function getDefaultRegistry(): LoggerRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createLoggerRegistry()
  }
  return defaultRegistry
}

/**
 * Shuts the default registry down and forgets it; the next call creates a
 * fresh one.
 */
export async function resetDefaultRegistry(): Promise<void> {
  const registry = defaultRegistry
  defaultRegistry = undefined

  await registry?.shutdown()
}

export function initLogger(config: LoggerConfig): Promise<string> {
  return getDefaultRegistry().initLogger(config)
}

export function log(name: string, level: Level, message: string): Promise<number | null> {
  return getDefaultRegistry().log(name, level, message)
}

export function trace(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().trace(name, fmt, ...args)
}

export function debug(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().debug(name, fmt, ...args)
}

export function info(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().info(name, fmt, ...args)
}

export function warn(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().warn(name, fmt, ...args)
}

export function error(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().error(name, fmt, ...args)
}

export function fatal(name: string, fmt: string, ...args: unknown[]): Promise<void> {
  return getDefaultRegistry().fatal(name, fmt, ...args)
}
