import { type Clock, SystemClock } from "@loungekit/clock"
import { type MemoryCacheEntry, MemoryEntityCache } from "./adapters/memory/memory-entity-cache"
import { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
import { LruMemoryMap } from "./core/eviction/lru-memory-map"
import { ReadThroughCache, type ReadThroughCacheOptions } from "./core/through/read-through"
import type { CacheKey } from "./ports/cache-key"
import type { CacheOptions } from "./ports/cache-options"

export type CreateReadThroughCacheOptions = CacheOptions & ReadThroughCacheOptions

export function createMemoryEntityCache<T>(
  opts: CacheOptions = {},
  clock: Clock = new SystemClock(),
): MemoryEntityCache<T> {
  const store =
    opts.eviction === "fifo"
      ? new FifoMemoryMap<CacheKey, MemoryCacheEntry<T>>()
      : new LruMemoryMap<CacheKey, MemoryCacheEntry<T>>()

  return new MemoryEntityCache<T>(
    { clock, store },
    {
      ...(opts.ttl !== undefined && { ttl: opts.ttl }),
      ...(opts.maxEntries !== undefined && { maxEntries: opts.maxEntries }),
    },
  )
}

export function createReadThroughCache<T>(
  opts: CreateReadThroughCacheOptions = {},
  clock?: Clock,
): ReadThroughCache<T> {
  return new ReadThroughCache<T>(
    { cache: createMemoryEntityCache<T>(opts, clock) },
    opts.serveStaleOnError === undefined ? {} : { serveStaleOnError: opts.serveStaleOnError },
  )
}
