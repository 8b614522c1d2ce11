import type { DashboardSection } from "./model/dashboard.model"

export const DASHBOARD_KEY = "dashboard"

export function dashboardSectionKey(section: DashboardSection): string {
  return `${DASHBOARD_KEY}:section:${section}`
}
