import type { Milliseconds } from "@screensync/clock"

export type OperationHandle = Readonly<{
  key: string
  startedAt: Milliseconds
}>

export type TrackResult<R> = { kind: "ran"; value: R } | { kind: "skipped" }

/**
 * Registry of in-flight operations keyed by logical id.
 *
 * `begin(key)` returns true at most once between two `end(key)` calls.
 */
export interface OperationTracker {
  /** Register `key` as in flight. False when it already is. */
  begin(key: string): boolean

  /** Release `key`. No-op when it is not registered. */
  end(key: string): void

  isOngoing(key: string): boolean

  handle(key: string): OperationHandle | undefined

  readonly size: number

  /**
   * Run `fn` while holding `key`. The key is released when `fn` settles,
   * whether it resolves or throws. Errors from `fn` propagate.
   */
  track<R>(key: string, fn: () => Promise<R>): Promise<TrackResult<R>>
}
