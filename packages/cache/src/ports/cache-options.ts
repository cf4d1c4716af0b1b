import type { Milliseconds, Seconds } from "@loungekit/clock"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export type CacheTtl = SecondsTtl | MillisecondsTtl

export type CacheOptions = {
  /**
   * How long an entry counts as fresh. Entries never expire without it.
   */
  ttl?: CacheTtl

  /**
   * Upper bound on retained entries. Unbounded without it.
   */
  maxEntries?: number

  /** @default "lru" */
  eviction?: CacheEvictionPolicy
}

export type CacheGetOptions = {
  /**
   * Return entries past their TTL (flagged `stale`) instead of a miss.
   *
   * @default false
   */
  allowStale: boolean
}
