import type { Logger } from "@screensync/logger"
import { toSyncError } from "../../errors/sync-error"
import type { ProgressiveLoader, ProgressiveRunOptions } from "../../ports/progressive-loader"
import type { CallPolicy } from "../../ports/remote-call"
import type { PartialResult, Tier, TierList, TierName, TierPriority } from "../../ports/tier"

export type StreamingProgressiveLoaderDeps = {
  logger: Logger
}

const priorityRank: Record<TierPriority, number> = {
  primary: 0,
  secondary: 1,
  tertiary: 2,
}

export class StreamingProgressiveLoader implements ProgressiveLoader {
  private readonly logger: Logger

  constructor(deps: StreamingProgressiveLoaderDeps) {
    this.logger = deps.logger.child({ module: "progressive-loader" })
  }

  run<M>(tiers: TierList<M>, opts: ProgressiveRunOptions = {}): AsyncIterable<PartialResult<M>> {
    const ordered = [...tiers].sort((a, b) => priorityRank[a.priority] - priorityRank[b.priority])

    return this.stream(ordered, opts)
  }

  private async *stream<M>(
    tiers: ReadonlyArray<Tier<M>>,
    { signal, policy }: ProgressiveRunOptions,
  ): AsyncGenerator<PartialResult<M>> {
    if (signal?.aborted) return

    const inFlight = new AbortController()
    const settled: PartialResult<M>[] = []
    let wake: (() => void) | undefined

    const notify = () => {
      const resume = wake
      wake = undefined
      resume?.()
    }
    const onAbort = () => {
      inFlight.abort()
      notify()
    }

    signal?.addEventListener("abort", onAbort, { once: true })

    for (const tier of tiers) {
      void this.settle(tier, inFlight.signal, policy).then((result) => {
        settled.push(result)
        notify()
      })
    }

    try {
      let remaining = tiers.length

      while (remaining > 0) {
        if (settled.length === 0) {
          await new Promise<void>((resolve) => {
            wake = resolve
          })
        }

        if (signal?.aborted) return

        const next = settled.shift()
        if (next === undefined) continue

        remaining--
        yield next
      }
    } finally {
      signal?.removeEventListener("abort", onAbort)
      inFlight.abort()
    }
  }

  private async settle<M, K extends TierName<M>>(
    tier: Tier<M, K>,
    signal: AbortSignal,
    policy: CallPolicy | undefined,
  ): Promise<PartialResult<M, K>> {
    try {
      const value = policy ? await policy(tier.name, (s) => tier.load(s), signal) : await tier.load(signal)

      return { tier: tier.name, kind: "value", value }
    } catch (err) {
      const error = toSyncError(err, tier.name)

      if (!signal.aborted) {
        this.logger.warn("tier failed", { tier: tier.name, err: error })
      }

      return { tier: tier.name, kind: "error", error }
    }
  }
}
