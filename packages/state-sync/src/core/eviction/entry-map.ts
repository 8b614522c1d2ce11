/**
 * Ordered key/value storage behind the in-memory operation cache.
 *
 * The ordering decides which key `victim()` names when a bounded cache is
 * over capacity.
 */
export interface EntryMap<V> {
  /** May reorder as a side effect (touch-on-read). */
  get(key: string): V | undefined

  /** Read without reordering. */
  peek(key: string): V | undefined

  set(key: string, value: V): void

  delete(key: string): boolean

  has(key: string): boolean

  /** Snapshot of the keys, oldest first. */
  keys(): string[]

  clear(): void

  size(): number

  /** Next key to evict, or `undefined` when empty. */
  victim(): string | undefined
}
