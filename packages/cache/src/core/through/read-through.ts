import { MemorySingleflight, type Singleflight } from "@loungekit/singleflight"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheStats } from "../../ports/cache-stats"
import type { EntityCache } from "../../ports/entity-cache"

/**
 * How a read was answered.
 * - "hit": fresh cache entry, no load
 * - "leader": this caller started the load
 * - "inflight": joined a load another caller started
 * - "stale": load failed, an expired entry was served instead
 */
export type ReadSource = "hit" | "leader" | "inflight" | "stale"

export type ReadResult<T> = {
  value: T
  source: ReadSource
}

export type ReadOptions = {
  /** Stops this caller waiting; a shared load keeps going. */
  signal?: AbortSignal
}

/**
 * Read-through capability (policy-level).
 */
export interface ReadThrough<T> {
  getThrough(key: CacheKey, loader: () => Promise<T>, opts?: ReadOptions): Promise<T>
}

export type ReadThroughCacheOptions = {
  /**
   * Decides whether a failed load may be answered with an expired entry.
   * Without it, failures always propagate.
   */
  serveStaleOnError?: (err: unknown) => boolean
}

export type ReadThroughCacheDeps<T> = {
  cache: EntityCache<T>
  flights?: Singleflight<T>
}

/**
 * Serves fresh entries from `cache`; otherwise runs `loader` once per key no
 * matter how many callers are waiting, and stores what it returns.
 *
 * @remarks
 * A load detached by `invalidate()` or `clear()` still settles for its waiters
 * but its value is not stored. Failed loads store nothing.
 */
export class ReadThroughCache<T> implements ReadThrough<T> {
  private readonly cache: EntityCache<T>
  private readonly flights: Singleflight<T>
  // Loads whose result may still be stored, by key. Detached loads are dropped.
  private readonly loads = new Map<CacheKey, symbol>()
  private readonly counters = { hits: 0, misses: 0, coalesced: 0, staleServed: 0, failures: 0 }

  public constructor(
    deps: ReadThroughCacheDeps<T>,
    private readonly opts: ReadThroughCacheOptions = {},
  ) {
    this.cache = deps.cache
    this.flights = deps.flights ?? new MemorySingleflight<T>()
  }

  async getThrough(key: CacheKey, loader: () => Promise<T>, opts?: ReadOptions): Promise<T> {
    const { value } = await this.read(key, loader, opts)

    return value
  }

  async read(key: CacheKey, loader: () => Promise<T>, opts: ReadOptions = {}): Promise<ReadResult<T>> {
    opts.signal?.throwIfAborted()

    const cached = this.cache.get(key, { allowStale: true })

    if (cached.kind === "hit" && !cached.stale) {
      this.counters.hits++
      return { value: cached.value, source: "hit" }
    }

    const token = Symbol(key)

    // The caller that finds no flight for `key` starts the load.
    if (!this.flights.has(key)) this.loads.set(key, token)

    try {
      const flight = await this.flights.run(
        key,
        () => this.load(key, loader, token),
        opts.signal === undefined ? {} : { signal: opts.signal },
      )

      if (flight.isLeader) this.counters.misses++
      else this.counters.coalesced++

      return { value: flight.value, source: flight.isLeader ? "leader" : "inflight" }
    } catch (err) {
      if (cached.kind === "hit" && !isAbortOf(err, opts.signal) && this.opts.serveStaleOnError?.(err) === true) {
        this.counters.staleServed++
        return { value: cached.value, source: "stale" }
      }

      throw err
    }
  }

  peek(key: CacheKey): T | undefined {
    const cached = this.cache.get(key)

    return cached.kind === "hit" ? cached.value : undefined
  }

  /**
   * Drop the entry for `key` and detach any load in progress for it.
   */
  invalidate(key: CacheKey): boolean {
    this.loads.delete(key)
    this.flights.forget(key)

    return this.cache.invalidate(key)
  }

  clear(): void {
    this.loads.clear()
    this.flights.forgetAll()
    this.cache.clear()
  }

  stats(): CacheStats {
    return { entries: this.cache.size, ...this.counters }
  }

  /** Loads in progress whose result will be stored. */
  get loading(): number {
    return this.loads.size
  }

  private async load(key: CacheKey, loader: () => Promise<T>, token: symbol): Promise<T> {
    try {
      const value = await loader()

      if (this.release(key, token)) this.cache.set(key, value)

      return value
    } catch (err) {
      this.release(key, token)
      this.counters.failures++
      throw err
    }
  }

  // False when the load was detached by `invalidate()` or `clear()`.
  private release(key: CacheKey, token: symbol): boolean {
    if (this.loads.get(key) !== token) return false

    this.loads.delete(key)

    return true
  }
}

function isAbortOf(err: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true && err === signal.reason
}
