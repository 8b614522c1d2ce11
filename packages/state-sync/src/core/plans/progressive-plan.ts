import { SyncError } from "../../errors/sync-error"
import type { FetchPlan } from "../../ports/fetch-plan"
import type { ProgressiveLoader } from "../../ports/progressive-loader"
import type { PartialResult, TierList } from "../../ports/tier"

export type ProgressivePlanOptions<T, M> = {
  loader: ProgressiveLoader
  tiers: TierList<M>
  /**
   * Starting point of the merge. Called with the cached server data for the
   * result, and once with the live data before the first tier lands on screen.
   */
  seed(current: T | null): T
  /** Fold one settled tier into the screen data. Failed tiers are passed too. */
  merge(data: T, partial: PartialResult<M>): T
}

type Settlement = { readonly kind: "value" } | { readonly kind: "error"; readonly error: SyncError }

/**
 * Loads screen data tier by tier, folding each settled tier into the live screen data.
 *
 * Fails only when every tier failed; otherwise the tiers that did load make up the result.
 */
export function progressivePlan<T, M>(opts: ProgressivePlanOptions<T, M>): FetchPlan<T> {
  return {
    async run(ctx) {
      let data = opts.seed(ctx.base)
      let seeded = false
      const failures: SyncError[] = []

      for await (const partial of opts.loader.run(opts.tiers, { signal: ctx.signal, policy: ctx.policy })) {
        const settlement: Settlement = partial
        if (settlement.kind === "error") failures.push(settlement.error)

        data = opts.merge(data, partial)

        const reseed = !seeded
        seeded = true
        ctx.publish((live) => opts.merge(reseed || live === null ? opts.seed(live) : live, partial))
      }

      if (opts.tiers.length > 0 && failures.length === opts.tiers.length) {
        throw SyncError.networkFailure(
          ctx.key,
          new AggregateError(failures, `All ${failures.length} tiers failed`),
        )
      }

      return data
    },
  }
}
