import type { Milliseconds, Sleeper } from "@screensync/clock"
import type { DashboardApi } from "../api/dashboard.api"
import type { DashboardSection, DashboardSections } from "../model/dashboard.model"

export type MemoryDashboardApiDeps = {
  clock: Sleeper
}

export type MemoryDashboardApiOptions = {
  sections: DashboardSections
  /** Simulated response time per section. */
  latencyMs?: Partial<Record<DashboardSection, Milliseconds>>
}

/**
 * In-process dashboard backend. Sections can be made to fail and every call is
 * recorded in `calls`.
 */
export class MemoryDashboardApi implements DashboardApi {
  readonly calls: DashboardSection[] = []

  private readonly sections: DashboardSections
  private readonly failing = new Set<DashboardSection>()

  constructor(
    private readonly deps: MemoryDashboardApiDeps,
    private readonly opts: MemoryDashboardApiOptions,
  ) {
    this.sections = { ...opts.sections }
  }

  async fetchSection<K extends DashboardSection>(
    section: K,
    signal: AbortSignal,
  ): Promise<DashboardSections[K]> {
    this.calls.push(section)

    await this.deps.clock.sleep(this.opts.latencyMs?.[section] ?? 0, signal)
    signal.throwIfAborted()

    if (this.failing.has(section)) {
      throw new Error(`Section "${section}" is unavailable`)
    }

    return this.sections[section]
  }

  setSection<K extends DashboardSection>(section: K, value: DashboardSections[K]): void {
    this.sections[section] = value
  }

  failSection(section: DashboardSection): void {
    this.failing.add(section)
  }

  restoreSection(section: DashboardSection): void {
    this.failing.delete(section)
  }
}
