import { FakeClock } from "@loungekit/clock"
import { FifoMemoryMap } from "../../../core/eviction/fifo-memory-map"
import { LruMemoryMap } from "../../../core/eviction/lru-memory-map"
import { type MemoryCacheEntry, MemoryEntityCache, type MemoryEntityCacheOptions } from "../memory-entity-cache"

function setup(opts: MemoryEntityCacheOptions = {}, policy: "lru" | "fifo" = "lru") {
  const clock = new FakeClock(1_000)
  const store =
    policy === "lru"
      ? new LruMemoryMap<string, MemoryCacheEntry<string>>()
      : new FifoMemoryMap<string, MemoryCacheEntry<string>>()

  return { clock, cache: new MemoryEntityCache<string>({ clock, store }, opts) }
}

describe("MemoryEntityCache", () => {
  describe("basics", () => {
    it("misses on an unknown key", () => {
      const { cache } = setup()

      expect(cache.get("k")).toEqual({ kind: "miss" })
    })

    it("returns the stored value with its timestamp", () => {
      const { cache } = setup()

      cache.set("k", "v")

      expect(cache.get("k")).toEqual({ kind: "hit", value: "v", storedAtMs: 1_000, stale: false })
    })

    it("replaces an entry on set", () => {
      const { cache, clock } = setup()

      cache.set("k", "a")
      clock.advance(5)
      cache.set("k", "b")

      expect(cache.get("k")).toEqual({ kind: "hit", value: "b", storedAtMs: 1_005, stale: false })
      expect(cache.size).toBe(1)
    })

    it("invalidate and clear remove entries", () => {
      const { cache } = setup()

      cache.set("a", "1")
      cache.set("b", "2")

      expect(cache.invalidate("a")).toBe(true)
      expect(cache.invalidate("a")).toBe(false)

      cache.clear()

      expect(cache.size).toBe(0)
      expect(cache.get("b")).toEqual({ kind: "miss" })
    })
  })

  describe("ttl", () => {
    it("never expires without a ttl", () => {
      const { cache, clock } = setup()

      cache.set("k", "v")
      clock.advance(10 ** 9)

      expect(cache.get("k").kind).toBe("hit")
    })

    it("treats expired entries as absent", () => {
      const { cache, clock } = setup({ ttl: { kind: "milliseconds", milliseconds: 100 } })

      cache.set("k", "v")
      clock.advance(99)
      expect(cache.get("k").kind).toBe("hit")

      clock.advance(1)
      expect(cache.get("k")).toEqual({ kind: "miss" })
    })

    it("returns expired entries flagged stale when allowed", () => {
      const { cache, clock } = setup({ ttl: { kind: "seconds", seconds: 1 } })

      cache.set("k", "v")
      clock.advance(1_000)

      expect(cache.get("k", { allowStale: true })).toEqual({
        kind: "hit",
        value: "v",
        storedAtMs: 1_000,
        stale: true,
      })
      expect(cache.size).toBe(1)
    })
  })

  describe("capacity", () => {
    it("evicts the least recently used entry", () => {
      const { cache } = setup({ maxEntries: 2 })

      cache.set("a", "1")
      cache.set("b", "2")
      cache.get("a")
      cache.set("c", "3")

      expect(cache.get("b").kind).toBe("miss")
      expect(cache.get("a").kind).toBe("hit")
      expect(cache.get("c").kind).toBe("hit")
    })

    it("evicts in insertion order with fifo", () => {
      const { cache } = setup({ maxEntries: 2 }, "fifo")

      cache.set("a", "1")
      cache.set("b", "2")
      cache.get("a")
      cache.set("c", "3")

      expect(cache.get("a").kind).toBe("miss")
      expect(cache.size).toBe(2)
    })

    it("does not evict when replacing an existing key", () => {
      const { cache } = setup({ maxEntries: 2 })

      cache.set("a", "1")
      cache.set("b", "2")
      cache.set("a", "3")

      expect(cache.size).toBe(2)
      expect(cache.get("b").kind).toBe("hit")
    })

    it("rejects a non-positive maxEntries", () => {
      expect(() => setup({ maxEntries: 0 })).toThrow(RangeError)
    })
  })
})
