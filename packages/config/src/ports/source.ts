/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig`; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Shown in provenance, e.g. `"env"`, `"dotenv:.env"`.
   */
  readonly name: string

  /**
   * An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
