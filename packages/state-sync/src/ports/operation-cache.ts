import type { Milliseconds } from "@screensync/clock"
import type { CacheEntry } from "./cache-entry"

export type CacheStats = Readonly<{
  size: number
  hits: number
  misses: number
}>

/**
 * Keyed store of the last successful response per operation.
 *
 * Purely in memory. No method throws for I/O.
 */
export interface OperationCache {
  /**
   * Read the entry stored under `key`.
   *
   * The caller picks `T`; it must match what was written under the key.
   */
  get<T>(key: string): CacheEntry<T> | undefined

  /** Replace the entry for `key`, stamping it with the current time. */
  put<T>(key: string, value: T): void

  /**
   * True when no entry exists or `now - writtenAt > thresholdMs`.
   * Does not count as a hit or a miss.
   */
  isStale(key: string, thresholdMs: Milliseconds): boolean

  /** Remove the entry. Returns whether one existed. */
  invalidate(key: string): boolean

  /** Remove every entry whose key starts with `prefix`. Returns the count removed. */
  invalidatePrefix(prefix: string): number

  clear(): void

  stats(): CacheStats
}
