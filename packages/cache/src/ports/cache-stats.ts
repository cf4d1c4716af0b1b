export type CacheStats = {
  /** Entries currently held, fresh or expired. */
  entries: number
  /** Reads answered from a fresh entry. */
  hits: number
  /** Reads that started a load. */
  misses: number
  /** Reads that joined a load another caller started. */
  coalesced: number
  /** Reads answered with an expired entry after a failed load. */
  staleServed: number
  /** Loads that rejected. */
  failures: number
}
