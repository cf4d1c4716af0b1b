import type { CacheKey } from "./cache-key"

export type KeyPart = string | number

/**
 * A logical, versioned keyspace for one kind of cached value.
 *
 * @example
 * ```
 * <prefix> + ":" + <part> + ":" + <part> ...
 * player:v1:name=foo:season=12
 * ```
 */
export interface CacheNamespace {
  /** e.g. `"player:v1"`. */
  readonly prefix: string

  key(...parts: readonly KeyPart[]): CacheKey
}
