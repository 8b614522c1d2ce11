import type { Milliseconds } from "@screensync/clock"
import { type DispatchOutcome, progressivePlan, StateContainer, type SyncCore } from "@screensync/state-sync"
import type { DashboardApi } from "../api/dashboard.api"
import { DASHBOARD_KEY, dashboardSectionKey } from "../keyspace"
import {
  type DashboardData,
  type DashboardSection,
  emptyDashboard,
  isDashboardSection,
} from "../model/dashboard.model"
import { dashboardTiers, mergeSection, seedDashboard, withFailedSection, withSection } from "./dashboard-sections"

export type DashboardContainerOptions = {
  api: DashboardApi
  staleThresholdMs?: Milliseconds
  backgroundRefreshMs?: Milliseconds
}

/**
 * Classroom dashboard. Loads its six sections by priority and reloads a single
 * section when one is selected.
 */
export class DashboardContainer extends StateContainer<DashboardData> {
  private readonly api: DashboardApi

  constructor(deps: SyncCore, opts: DashboardContainerOptions) {
    super(deps, {
      screenKey: DASHBOARD_KEY,
      plan: progressivePlan({
        loader: deps.loader,
        tiers: dashboardTiers(opts.api),
        seed: seedDashboard,
        merge: mergeSection,
      }),
      staleThresholdMs: opts.staleThresholdMs,
      backgroundRefreshMs: opts.backgroundRefreshMs,
    })

    this.api = opts.api
  }

  protected selectItem(id: string): Promise<DispatchOutcome> {
    if (!isDashboardSection(id)) return Promise.resolve({ kind: "skipped", reason: "unsupported" })

    return this.reloadSection(id)
  }

  private async reloadSection<K extends DashboardSection>(section: K): Promise<DispatchOutcome> {
    const result = await this.fetchKeyed(
      dashboardSectionKey(section),
      (signal) => this.api.fetchSection(section, signal),
      { forceRefresh: true },
    )

    switch (result.kind) {
      case "skipped":
        return { kind: "skipped", reason: "duplicate_operation" }

      case "failed":
        this.update((data) => withFailedSection(data ?? emptyDashboard(), section))
        return { kind: "failed", error: result.error }

      case "value":
        this.update((data) => withSection(data ?? emptyDashboard(), section, result.value))
        return { kind: "completed", source: result.fromCache ? "cache" : "network" }
    }
  }
}
