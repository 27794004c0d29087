/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in
 * `loadConfig`. Sources are applied in order and later ones win.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance, e.g. "env" or "dotenv:.env".
   */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as
   * "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
