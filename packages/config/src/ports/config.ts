/**
 * Validated configuration plus the provenance of each value.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_ADDR: z.string().default("localhost:6379") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("REDIS_ADDR")     // "localhost:6379"
 * config.explain("REDIS_ADDR") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined by the schema. Useful for
   * spotting typos and stale settings.
   */
  unknownKeys(): string[]
}
