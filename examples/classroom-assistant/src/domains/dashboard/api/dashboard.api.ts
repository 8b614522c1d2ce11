import type { DashboardSection, DashboardSections } from "../model/dashboard.model"

export interface DashboardApi {
  fetchSection<K extends DashboardSection>(section: K, signal: AbortSignal): Promise<DashboardSections[K]>
}
