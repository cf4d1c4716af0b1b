/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ TIMEOUT_MS: z.coerce.number().default(10_000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "LOUNGE_" })],
 * })
 *
 * config.get("TIMEOUT_MS") // 10000
 * config.explain("TIMEOUT_MS") // "default"
 * ```
 */
export interface IConfig<T extends object> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /**
   * Keys supplied by a source that the schema does not know. Usually typos.
   */
  unknownKeys(): string[]
}
