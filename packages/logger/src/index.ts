export {
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  ConsoleLogger,
} from "./adapters/console/console-logger"
export { NullLogger } from "./adapters/null/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
} from "./ports/log-context"
export {
  LEVEL_SEVERITY,
  type LogLevel,
  type LogLevelName,
  logLevelNames,
  LogLevels,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
