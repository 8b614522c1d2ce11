import type { Logger } from "@screensync/logger"
import { toSyncError } from "../../errors/sync-error"
import type {
  ApplyOptions,
  OptimisticCoordinator,
  OptimisticOutcome,
  Reconcile,
} from "../../ports/optimistic"

export type OptimisticUpdateCoordinatorDeps = {
  logger: Logger
}

export class OptimisticUpdateCoordinator implements OptimisticCoordinator {
  private readonly logger: Logger

  constructor(deps: OptimisticUpdateCoordinatorDeps) {
    this.logger = deps.logger.child({ module: "optimistic" })
  }

  async apply<T>(
    tentative: T,
    remoteCall: () => Promise<T>,
    reconcile: Reconcile<T>,
    opts: ApplyOptions = {},
  ): Promise<OptimisticOutcome<T>> {
    const key = opts.key ?? "optimistic"

    reconcile(tentative, true)

    let confirmed: T
    try {
      confirmed = await remoteCall()
    } catch (err) {
      const error = toSyncError(err, key)
      this.logger.warn("optimistic mutation failed", { key, err: error })

      return { kind: "failed", error }
    }

    reconcile(confirmed, false)

    return { kind: "committed", value: confirmed }
  }
}
