export {
  backupIndex,
  RollingFileWriter,
  type RollingFileWriterDeps,
  type RollingFileWriterOptions,
} from "./adapters/fs/rolling-file-writer"
export {
  DEFAULT_ENV_PREFIX,
  type LoadLoggerConfigOptions,
  type LoggerEnv,
  loadLoggerConfig,
} from "./core/config/load-logger-config"
export {
  defaultLoggerConfig,
  LoggerConfigBuilder,
  processName,
} from "./core/config/logger-config-builder"
export {
  fileStem,
  loggerConfigSchema,
  validateLoggerConfig,
} from "./core/config/logger-config-schema"
export { formatTimestamp } from "./core/format/format-timestamp"
export {
  formatLine,
  type LineFormatterDeps,
  LineFormatter,
  type LineParts,
} from "./core/format/line-formatter"
export { computeThreadTag, currentThreadTag, THREAD_TAG_MODULUS } from "./core/format/thread-tag"
export {
  type ExitFn,
  InstanceLogger,
  type InstanceLoggerDeps,
} from "./core/logger/instance-logger"
export {
  AsyncRelay,
  type AsyncRelayDeps,
  type AsyncRelayOptions,
  DEFAULT_RELAY_CAPACITY,
} from "./core/relay/async-relay"
export {
  debug,
  error,
  fatal,
  getDefaultRegistry,
  info,
  initLogger,
  log,
  resetDefaultRegistry,
  trace,
  warn,
} from "./core/registry/default-registry"
export {
  createLoggerRegistry,
  LoggerRegistry,
  type LoggerRegistryDeps,
} from "./core/registry/logger-registry"
export { SharedWriter } from "./core/writer/shared-writer"
export {
  ConfigurationError,
  DirectoryCreationError,
  FileOpenError,
  HandleReleasedError,
  type LoggingErrorOptions,
  RelayClosedError,
  RelayFullError,
  RotationError,
  WriteError,
} from "./errors/errors"
export type { FileWriter, RotationState } from "./ports/file-writer"
export { type Level, levels } from "./ports/level"
export type { LoggerConfig, OverflowPolicy, TimeZone } from "./ports/logger-config"
