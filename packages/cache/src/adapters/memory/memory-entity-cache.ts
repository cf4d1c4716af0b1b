import type { Clock, UnixMs } from "@loungekit/clock"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheGetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { EntityCache } from "../../ports/entity-cache"

export type MemoryEntityCacheOptions = {
  ttl?: CacheTtl
  /**
   * When exceeded, entries are evicted according to the store's policy.
   */
  maxEntries?: number
}

export type MemoryEntityCacheDeps<T> = {
  clock: Clock
  store: EvictionMap<CacheKey, MemoryCacheEntry<T>>
}

export type MemoryCacheEntry<T> = Readonly<{
  value: T
  storedAtMs: UnixMs
  expiresAtMs?: UnixMs
}>

export class MemoryEntityCache<T> implements EntityCache<T> {
  public constructor(
    private readonly deps: MemoryEntityCacheDeps<T>,
    private readonly opts: MemoryEntityCacheOptions = {},
  ) {
    if (opts.maxEntries !== undefined && !(Number.isSafeInteger(opts.maxEntries) && opts.maxEntries > 0)) {
      throw new RangeError(`maxEntries must be a positive integer (got ${opts.maxEntries})`)
    }
  }

  get(key: CacheKey, opts?: Partial<CacheGetOptions>): CacheResult<T> {
    const entry = this.deps.store.get(key)

    if (entry === undefined) return { kind: "miss" }

    const stale = this.isExpired(entry)

    // Expired entries stay until replaced so a failed refresh can still fall back to them.
    if (stale && opts?.allowStale !== true) return { kind: "miss" }

    return { kind: "hit", value: entry.value, storedAtMs: entry.storedAtMs, stale }
  }

  set(key: CacheKey, value: T): void {
    if (!this.deps.store.has(key)) this.ensureCapacityForOneMore()

    const storedAtMs = this.deps.clock.nowMs()
    const expiresAtMs = this.expiresAt(storedAtMs)

    this.deps.store.set(key, {
      value,
      storedAtMs,
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  invalidate(key: CacheKey): boolean {
    return this.deps.store.delete(key)
  }

  clear(): void {
    this.deps.store.clear()
  }

  get size(): number {
    return this.deps.store.size()
  }

  private expiresAt(storedAtMs: UnixMs): UnixMs | undefined {
    const ttl = this.opts.ttl

    if (ttl === undefined) return undefined
    if (ttl.kind === "seconds") return storedAtMs + ttl.seconds * 1000

    return storedAtMs + ttl.milliseconds
  }

  private isExpired(entry: MemoryCacheEntry<T>): boolean {
    if (entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.deps.clock.nowMs()
  }

  private ensureCapacityForOneMore(): void {
    const max = this.opts.maxEntries

    if (max === undefined) return

    while (this.deps.store.size() >= max) {
      const victim = this.deps.store.victim()

      if (victim === undefined) {
        throw new Error("Invariant violation: EvictionMap.victim() returned undefined while over capacity")
      }

      this.deps.store.delete(victim)
    }
  }
}
