import type { FetchPlan } from "../../ports/fetch-plan"
import type { RemoteCall } from "../../ports/remote-call"

/**
 * Loads screen data with a single remote call. The response replaces what is on screen.
 */
export function directPlan<T>(fetch: RemoteCall<T>): FetchPlan<T> {
  return {
    run: (ctx) => ctx.policy(ctx.key, fetch, ctx.signal),
  }
}
