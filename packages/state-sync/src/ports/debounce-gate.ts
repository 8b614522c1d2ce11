import type { Milliseconds } from "@screensync/clock"

/**
 * Rate limiter for high-frequency advisory signals such as typing indicators.
 */
export interface DebounceGate {
  /**
   * True, recording `now`, when no call for `signalKey` was accepted within the
   * last `windowMs`. False otherwise; a rejected call records nothing.
   */
  allow(signalKey: string, windowMs: Milliseconds): boolean

  /** Forget the last accepted call for `signalKey`. */
  reset(signalKey: string): void
}
