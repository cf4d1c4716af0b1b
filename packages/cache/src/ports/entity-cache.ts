import type { CacheKey } from "./cache-key"
import type { CacheGetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * In-process store of decoded values, keyed by entity identity.
 *
 * @remarks
 * Every operation is synchronous. Entries are replaced, never mutated.
 */
export interface EntityCache<T> {
  get(key: CacheKey, opts?: Partial<CacheGetOptions>): CacheResult<T>

  /** Insert or replace. */
  set(key: CacheKey, value: T): void

  /** Returns `true` when an entry was removed. */
  invalidate(key: CacheKey): boolean

  clear(): void

  readonly size: number
}
