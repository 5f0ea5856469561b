/**
 * Map-like storage that knows which key to evict next.
 *
 * Implementations may reorder entries on `get` and `set` (touch-on-read for
 * LRU). Capacity is enforced by the caller through `victim()`.
 */
export interface EvictionMap<K, V> {
  get(key: K): V | undefined

  set(key: K, value: V): void

  /** Returns true if the key was present. */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /** Removes every entry. */
  clear(): void

  /** The next key to evict, or `undefined` if empty. */
  victim(): K | undefined
}
