import type { EvictionMap } from "./eviction-map"
import { LruMemoryMap } from "./lru-memory-map"

export type BoundedCacheOptions = {
  /** Maximum number of entries retained. */
  maxEntries: number
}

/**
 * Keeps at most `maxEntries` values, evicting according to the store's policy
 * (least recently used by default) before inserting a new key.
 */
export class BoundedCache<K, V> {
  constructor(
    private readonly opts: BoundedCacheOptions,
    private readonly store: EvictionMap<K, V> = new LruMemoryMap<K, V>(),
  ) {
    if (!Number.isSafeInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }
  }

  get(key: K): V | undefined {
    return this.store.get(key)
  }

  set(key: K, value: V): void {
    if (!this.store.has(key)) this.makeRoom()

    this.store.set(key, value)
  }

  clear(): void {
    this.store.clear()
  }

  size(): number {
    return this.store.size()
  }

  private makeRoom(): void {
    while (this.store.size() >= this.opts.maxEntries) {
      const victim = this.store.victim()

      if (victim === undefined) {
        throw new Error("Invariant violation: EvictionMap.victim() returned undefined while full")
      }

      this.store.delete(victim)
    }
  }
}
