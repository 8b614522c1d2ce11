import type { Milliseconds } from "@screensync/clock"
import type { ScreenPhase, ScreenState } from "../ports/screen-state"

export function initialScreenState<T>(): ScreenState<T> {
  return Object.freeze({
    isLoading: false,
    isRefreshing: false,
    data: null,
    error: null,
    lastUpdated: null,
    isFromCache: false,
    isConnected: false,
  })
}

export function isStale<T>(state: ScreenState<T>, nowMs: Milliseconds, thresholdMs: Milliseconds): boolean {
  return state.lastUpdated === null || nowMs - state.lastUpdated > thresholdMs
}

/** Stale and not already being fetched. */
export function needsRefresh<T>(
  state: ScreenState<T>,
  nowMs: Milliseconds,
  thresholdMs: Milliseconds,
): boolean {
  return isStale(state, nowMs, thresholdMs) && !state.isLoading && !state.isRefreshing
}

export function phaseOf<T>(state: ScreenState<T>): ScreenPhase {
  if (state.isLoading) return "loading"
  if (state.isRefreshing) return "refreshing"
  if (state.error !== null) return "error"
  if (state.lastUpdated === null) return "initial"

  return "loaded"
}
