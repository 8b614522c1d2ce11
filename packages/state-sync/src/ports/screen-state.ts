import type { Milliseconds } from "@screensync/clock"
import type { SyncError } from "../errors/sync-error"

/**
 * Snapshot of a screen's data lifecycle. `isLoading` and `isRefreshing` are
 * never both true.
 */
export type ScreenState<T> = Readonly<{
  isLoading: boolean
  isRefreshing: boolean
  data: T | null
  /** Set only when the latest attempt failed and no cached fallback was served. */
  error: SyncError | null
  lastUpdated: Milliseconds | null
  isFromCache: boolean
  isConnected: boolean
}>

export type ScreenPhase = "initial" | "loading" | "loaded" | "refreshing" | "error"

export type StateListener<T> = (state: ScreenState<T>) => void

export type Unsubscribe = () => void
