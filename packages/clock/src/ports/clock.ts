import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for staleness and window checks.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Suspend for `ms` milliseconds.
   *
   * Resolves early (never rejects) when `signal` aborts, so callers can tear down
   * a polling loop by aborting instead of waiting out the delay.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
