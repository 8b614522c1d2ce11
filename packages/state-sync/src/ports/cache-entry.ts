import type { Milliseconds } from "@screensync/clock"

/**
 * A cached response. Entries are immutable; a write swaps in a new entry.
 */
export type CacheEntry<T> = Readonly<{
  key: string
  value: T
  writtenAt: Milliseconds
}>
