import type { TimeSource } from "@screensync/clock"
import type { OperationHandle, OperationTracker, TrackResult } from "../../ports/operation-tracker"

export type MemoryOperationTrackerDeps = {
  clock: TimeSource
}

export class MemoryOperationTracker implements OperationTracker {
  private readonly handles = new Map<string, OperationHandle>()

  constructor(private readonly deps: MemoryOperationTrackerDeps) {}

  begin(key: string): boolean {
    if (this.handles.has(key)) return false

    this.handles.set(key, Object.freeze({ key, startedAt: this.deps.clock.nowMs() }))

    return true
  }

  end(key: string): void {
    this.handles.delete(key)
  }

  isOngoing(key: string): boolean {
    return this.handles.has(key)
  }

  handle(key: string): OperationHandle | undefined {
    return this.handles.get(key)
  }

  get size(): number {
    return this.handles.size
  }

  async track<R>(key: string, fn: () => Promise<R>): Promise<TrackResult<R>> {
    if (!this.begin(key)) return { kind: "skipped" }

    try {
      return { kind: "ran", value: await fn() }
    } finally {
      this.end(key)
    }
  }
}
