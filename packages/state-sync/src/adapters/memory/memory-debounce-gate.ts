import type { Milliseconds, TimeSource } from "@screensync/clock"
import type { DebounceGate } from "../../ports/debounce-gate"

export type MemoryDebounceGateDeps = {
  clock: TimeSource
}

export class MemoryDebounceGate implements DebounceGate {
  private readonly lastAccepted = new Map<string, Milliseconds>()

  constructor(private readonly deps: MemoryDebounceGateDeps) {}

  allow(signalKey: string, windowMs: Milliseconds): boolean {
    const now = this.deps.clock.nowMs()
    const last = this.lastAccepted.get(signalKey)

    if (last !== undefined && now - last < windowMs) return false

    this.lastAccepted.set(signalKey, now)

    return true
  }

  reset(signalKey: string): void {
    this.lastAccepted.delete(signalKey)
  }
}
