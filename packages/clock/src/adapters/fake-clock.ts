import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAtMs: Milliseconds
  order: number
  wake: () => void
}

/**
 * Manually driven clock for tests.
 *
 * Time only moves through `advance()` or `set()`. Pending `sleep()` calls resolve
 * when the clock reaches their deadline, earliest deadline first (ties in call order).
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private pending: PendingSleep[] = []
  private nextOrder = 0

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps still waiting for the clock to reach their deadline. */
  get pendingSleeps(): number {
    return this.pending.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const sleeper: PendingSleep = {
        wakeAtMs: this.time + ms,
        order: this.nextOrder++,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.pending = this.pending.filter((p) => p !== sleeper)
        resolve()
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.pending.push(sleeper)
    })
  }

  private wakeDue(): void {
    const due = this.pending
      .filter((p) => p.wakeAtMs <= this.time)
      .sort((a, b) => a.wakeAtMs - b.wakeAtMs || a.order - b.order)

    if (due.length === 0) return

    this.pending = this.pending.filter((p) => p.wakeAtMs > this.time)

    for (const sleeper of due) sleeper.wake()
  }
}
