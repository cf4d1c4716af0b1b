/**
 * CacheKey is a plain string for ergonomics.
 *
 * Keys should be stable, namespaced and versioned. Build them through a
 * {@link CacheNamespace} rather than interpolating at call sites.
 *
 * @example
 * ```ts
 * const key: CacheKey = "player:v1:name=foo"
 * ```
 */
export type CacheKey = string
