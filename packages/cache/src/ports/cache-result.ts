import type { UnixMs } from "@loungekit/clock"

export type CacheHit<T> = {
  kind: "hit"
  value: T
  storedAtMs: UnixMs
  /** Past its TTL. Only returned when the caller asked for stale entries. */
  stale: boolean
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss
