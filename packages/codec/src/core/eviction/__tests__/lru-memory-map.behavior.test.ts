import { LruMemoryMap } from "../lru-memory-map"

describe("LruMemoryMap (behavior)", () => {
  let map: LruMemoryMap<string, number>

  beforeEach(() => {
    map = new LruMemoryMap()
    map.set("a", 1)
    map.set("b", 2)
    map.set("c", 3)
  })

  it("evicts the oldest insert first", () => {
    expect(map.victim()).toBe("a")
  })

  it("get marks a key as recently used", () => {
    expect(map.get("a")).toBe(1)

    expect(map.victim()).toBe("b")
  })

  it("set on an existing key marks it as recently used", () => {
    map.set("a", 10)

    expect(map.victim()).toBe("b")
    expect(map.get("a")).toBe(10)
  })

  it("a miss leaves ordering untouched", () => {
    expect(map.get("z")).toBeUndefined()

    expect(map.victim()).toBe("a")
  })
})
