/**
 * Where raw configuration values come from.
 *
 * A source only loads; validation, coercion and merging happen in
 * `loadConfig`. Sources are applied in order and later ones win.
 */
export interface ConfigSource {
  /**
   * Names the source in `ConfigSourceError`, e.g. "env", "dotenv:.env" or
   * "json:rotolog.json".
   */
  readonly name: string

  /**
   * Env and dotenv sources yield strings; JSON and object sources may yield
   * numbers and booleans. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
