import type { Milliseconds, TimeSource } from "@screensync/clock"
import type { EntryMap } from "../../core/eviction/entry-map"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheStats, OperationCache } from "../../ports/operation-cache"

export type MemoryOperationCacheDeps = {
  clock: TimeSource
  store: EntryMap<CacheEntry<unknown>>
}

export type MemoryOperationCacheOptions = {
  /**
   * Upper bound on retained entries. When a write would exceed it, the store's
   * victim is evicted first. Unset retains everything.
   */
  maxEntries?: number
}

export class MemoryOperationCache implements OperationCache {
  private hits = 0
  private misses = 0

  constructor(
    private readonly deps: MemoryOperationCacheDeps,
    private readonly opts: MemoryOperationCacheOptions = {},
  ) {
    if (opts.maxEntries !== undefined && !(Number.isInteger(opts.maxEntries) && opts.maxEntries > 0)) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }
  }

  get<T>(key: string): CacheEntry<T> | undefined {
    const entry = this.deps.store.get(key)

    if (entry === undefined) {
      this.misses++
      return undefined
    }

    this.hits++

    // Values are stored untyped; a key is read back with the type it was written with.
    return entry as CacheEntry<T>
  }

  put<T>(key: string, value: T): void {
    if (!this.deps.store.has(key)) this.ensureCapacityForOne()

    this.deps.store.set(key, Object.freeze({ key, value, writtenAt: this.deps.clock.nowMs() }))
  }

  isStale(key: string, thresholdMs: Milliseconds): boolean {
    const entry = this.deps.store.peek(key)

    if (entry === undefined) return true

    return this.deps.clock.nowMs() - entry.writtenAt > thresholdMs
  }

  invalidate(key: string): boolean {
    return this.deps.store.delete(key)
  }

  invalidatePrefix(prefix: string): number {
    let removed = 0

    for (const key of this.deps.store.keys()) {
      if (key.startsWith(prefix) && this.deps.store.delete(key)) removed++
    }

    return removed
  }

  clear(): void {
    this.deps.store.clear()
  }

  stats(): CacheStats {
    return { size: this.deps.store.size(), hits: this.hits, misses: this.misses }
  }

  private ensureCapacityForOne(): void {
    const { maxEntries } = this.opts
    if (maxEntries === undefined) return

    while (this.deps.store.size() >= maxEntries) {
      const victim = this.deps.store.victim()

      if (victim === undefined) {
        throw new Error("Invariant violation: EntryMap.victim() returned undefined while over capacity")
      }

      this.deps.store.delete(victim)
    }
  }
}
