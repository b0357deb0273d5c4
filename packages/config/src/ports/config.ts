/**
 * Validated configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ MAX_FILES: z.coerce.number().default(5) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("MAX_FILES") // 5
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]
}
