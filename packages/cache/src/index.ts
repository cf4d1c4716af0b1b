export {
  type MemoryCacheEntry,
  MemoryEntityCache,
  type MemoryEntityCacheDeps,
  type MemoryEntityCacheOptions,
} from "./adapters/memory/memory-entity-cache"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { createNamespace } from "./core/namespace"
export {
  type ReadOptions,
  type ReadResult,
  type ReadSource,
  type ReadThrough,
  ReadThroughCache,
  type ReadThroughCacheDeps,
  type ReadThroughCacheOptions,
} from "./core/through/read-through"
export {
  createMemoryEntityCache,
  createReadThroughCache,
  type CreateReadThroughCacheOptions,
} from "./create"
export {
  cacheEvictionPolicies,
  type CacheEvictionPolicy,
  type FifoCacheEvictionPolicy,
  type LruCacheEvictionPolicy,
} from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export type { CacheNamespace, KeyPart } from "./ports/cache-namespace"
export type { CacheGetOptions, CacheOptions, CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheStats } from "./ports/cache-stats"
export type { EntityCache } from "./ports/entity-cache"
