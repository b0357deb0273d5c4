export { type DotenvSourceOptions, DotenvSource } from "./adapters/dotenv/dotenv-source"
export { type EnvSourceOptions, EnvSource } from "./adapters/env/env-source"
export { type JsonSourceOptions, JsonSource } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigSourceError, ConfigValidationError } from "./core/errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
