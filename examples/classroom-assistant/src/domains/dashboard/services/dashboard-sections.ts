import type { PartialResult, Tier, TierList } from "@screensync/state-sync"
import type { DashboardApi } from "../api/dashboard.api"
import {
  type DashboardData,
  type DashboardSection,
  type DashboardSections,
  emptyDashboard,
  sectionPriorities,
} from "../model/dashboard.model"

function sectionTier<K extends DashboardSection>(api: DashboardApi, name: K): Tier<DashboardSections, K> {
  return {
    name,
    priority: sectionPriorities[name],
    load: (signal) => api.fetchSection(name, signal),
  }
}

export function dashboardTiers(api: DashboardApi): TierList<DashboardSections> {
  return [
    sectionTier(api, "stats"),
    sectionTier(api, "activities"),
    sectionTier(api, "analytics"),
    sectionTier(api, "recommendations"),
    sectionTier(api, "insights"),
    sectionTier(api, "achievements"),
  ]
}

/** A refresh starts from what is on screen, with no section marked failed. */
export function seedDashboard(current: DashboardData | null): DashboardData {
  return current === null ? emptyDashboard() : { ...current, failedSections: [] }
}

export function withSection<K extends DashboardSection>(
  data: DashboardData,
  section: K,
  value: DashboardSections[K],
): DashboardData {
  const sections: Partial<DashboardSections> = { ...data.sections }
  sections[section] = value

  return {
    sections,
    failedSections: data.failedSections.filter((s) => s !== section),
  }
}

export function withFailedSection(data: DashboardData, section: DashboardSection): DashboardData {
  if (data.failedSections.includes(section)) return data

  return { ...data, failedSections: [...data.failedSections, section] }
}

export function mergeSection(data: DashboardData, partial: PartialResult<DashboardSections>): DashboardData {
  if (partial.kind === "error") return withFailedSection(data, partial.tier)

  return withSection(data, partial.tier, partial.value)
}
