/**
 * Eviction-aware key/value storage used by the memory cache.
 *
 * Hides ordering (LRU, FIFO) behind a small Map-like surface.
 */
export interface EvictionMap<K, V> {
  /**
   * May update ordering as a side effect (touch-on-read for LRU).
   */
  get(key: K): V | undefined

  set(key: K, value: V): void

  delete(key: K): boolean

  has(key: K): boolean

  clear(): void

  size(): number

  /**
   * Next key to evict under this map's policy, or `undefined` when empty.
   */
  victim(): K | undefined
}

export function firstKey<K>(map: ReadonlyMap<K, unknown>): K | undefined {
  for (const key of map.keys()) return key

  return undefined
}
