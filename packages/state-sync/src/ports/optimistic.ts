import type { Milliseconds } from "@screensync/clock"
import type { SyncError } from "../errors/sync-error"
import type { RemoteCall } from "./remote-call"

/**
 * A locally applied mutation, keyed by its local id until the server confirms it.
 */
export type OptimisticEntry<I> =
  | Readonly<{ state: "tentative"; id: string; value: I; submittedAt: Milliseconds }>
  | Readonly<{ state: "confirmed"; id: string; value: I; confirmedAt: Milliseconds }>

export type Reconcile<T> = (value: T, isOptimistic: boolean) => void

export type OptimisticOutcome<T> =
  | { kind: "committed"; value: T }
  | { kind: "failed"; error: SyncError }

export type ApplyOptions = {
  /** Names the mutation in logs and errors. */
  key?: string
}

export interface OptimisticCoordinator {
  /**
   * Calls `reconcile(tentative, true)` synchronously, then `remoteCall()`.
   * On success calls `reconcile(confirmed, false)`; on failure calls nothing
   * further. Never retries.
   */
  apply<T>(
    tentative: T,
    remoteCall: () => Promise<T>,
    reconcile: Reconcile<T>,
    opts?: ApplyOptions,
  ): Promise<OptimisticOutcome<T>>
}

/**
 * How a screen places and removes one optimistic item in its data.
 */
export type OptimisticMutation<T, I> = Readonly<{
  id: string
  tentative: I
  remoteCall: RemoteCall<I>
  /** Insert `entry`, or replace the entry with the same id. */
  place(data: T | null, entry: OptimisticEntry<I>): T
  /** Drop the entry with `id`. */
  remove(data: T, id: string): T
  /** Cache keys whose server value changes once the mutation commits. */
  invalidates?: readonly string[]
}>
