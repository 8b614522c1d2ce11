import type { SyncError } from "../errors/sync-error"

export type TierPriority = "primary" | "secondary" | "tertiary"

/**
 * Names of the tiers of a tier map. A tier map is an object type from tier name
 * to the value that tier loads, e.g. `{ stats: Stats; activities: Activity[] }`.
 */
export type TierName<M> = keyof M & string

export type Tier<M, K extends TierName<M> = TierName<M>> = {
  readonly name: K
  readonly priority: TierPriority
  load(signal: AbortSignal): Promise<M[K]>
}

/** Tiers of `M`, each tier's `load` typed by its own name. */
export type TierList<M> = ReadonlyArray<{ [K in TierName<M>]: Tier<M, K> }[TierName<M>]>

export type TierOutcome<M, K extends TierName<M>> =
  | { readonly tier: K; readonly kind: "value"; readonly value: M[K] }
  | { readonly tier: K; readonly kind: "error"; readonly error: SyncError }

type TierOutcomes<M> = { [K in TierName<M>]: TierOutcome<M, K> }

/** One settled tier. Narrow on `kind` and `tier` to reach the typed value. */
export type PartialResult<M, K extends TierName<M> = TierName<M>> = TierOutcomes<M>[K]
