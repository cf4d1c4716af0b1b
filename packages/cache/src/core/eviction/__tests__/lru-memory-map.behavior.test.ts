import { LruMemoryMap } from "../lru-memory-map"

describe("LruMemoryMap (behavior)", () => {
  let map: LruMemoryMap<string, number>

  beforeEach(() => {
    map = new LruMemoryMap()
    map.set("a", 1)
    map.set("b", 2)
    map.set("c", 3)
  })

  it("get moves a key to most recent", () => {
    map.get("a")

    expect(map.victim()).toBe("b")
  })

  it("set on an existing key moves it to most recent", () => {
    map.set("a", 10)

    expect(map.victim()).toBe("b")
  })

  it("has does not change the order", () => {
    map.has("a")

    expect(map.victim()).toBe("a")
  })

  it("a missed get leaves the order alone", () => {
    map.get("zzz")

    expect(map.victim()).toBe("a")
  })
})
