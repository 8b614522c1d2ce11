import type { CallPolicy } from "./remote-call"

export type FetchContext<T> = {
  /** Cache key of the screen. */
  key: string
  signal: AbortSignal
  /** Last data the server returned for `key`, while it is still cached. */
  base: T | null
  policy: CallPolicy
  /**
   * Fold a result into the data on screen. `change` receives the live data,
   * with whatever optimistic entries, pushes and selections landed meanwhile.
   */
  publish(change: (data: T | null) => T): void
}

/**
 * How a screen obtains its data: one call, or several progressive tiers.
 *
 * `run` resolves with the server's view of the data, which is what gets cached.
 * A plan that published stays as published on screen; otherwise the result is shown.
 */
export interface FetchPlan<T> {
  run(ctx: FetchContext<T>): Promise<T>
}
