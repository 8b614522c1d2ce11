import type { Milliseconds, Sleeper } from "@screensync/clock"
import { SyncError } from "../../errors/sync-error"
import type { CallPolicy, RemoteCall } from "../../ports/remote-call"

export type TimeoutPolicyDeps = {
  clock: Sleeper
}

export type TimeoutPolicyOptions = {
  timeoutMs: Milliseconds
}

/**
 * Rejects with a `timeout` SyncError when a call outlives `timeoutMs`, and aborts
 * the call's signal so it can stop.
 */
export function createTimeoutPolicy(deps: TimeoutPolicyDeps, opts: TimeoutPolicyOptions): CallPolicy {
  if (!(opts.timeoutMs > 0)) {
    throw new RangeError(`timeoutMs must be positive, got ${opts.timeoutMs}`)
  }

  return async function withTimeout<T>(key: string, call: RemoteCall<T>, signal: AbortSignal): Promise<T> {
    const controller = new AbortController()
    const forwardAbort = () => controller.abort()

    if (signal.aborted) controller.abort()
    else signal.addEventListener("abort", forwardAbort, { once: true })

    let finished = false
    const timeout = new Promise<never>((_, reject) => {
      void deps.clock.sleep(opts.timeoutMs, controller.signal).then(() => {
        if (finished || controller.signal.aborted) return

        reject(SyncError.timeout(key, opts.timeoutMs))
        controller.abort()
      })
    })

    try {
      return await Promise.race([call(controller.signal), timeout])
    } finally {
      finished = true
      controller.abort()
      signal.removeEventListener("abort", forwardAbort)
    }
  }
}
