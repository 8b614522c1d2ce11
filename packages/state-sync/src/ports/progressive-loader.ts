import type { CallPolicy } from "./remote-call"
import type { PartialResult, TierList } from "./tier"

export type ProgressiveRunOptions = {
  /** Ends the iteration. Tiers settling afterwards are discarded. */
  signal?: AbortSignal
  /** Wraps each tier's load. */
  policy?: CallPolicy
}

/**
 * Starts every tier at once and yields each settlement as it happens.
 *
 * Tiers are initiated in priority order (primary, secondary, tertiary), not in
 * the order they are declared; ties keep declaration order. A tier list may
 * list sections in display order while its primary tiers still go out first.
 * No tier waits for another.
 */
export interface ProgressiveLoader {
  run<M>(tiers: TierList<M>, opts?: ProgressiveRunOptions): AsyncIterable<PartialResult<M>>
}
