import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { RemoteApis } from "../../../app/services/remote"
import { DashboardContainer } from "../services/dashboard-container"

export type DashboardServices = {
  container: DashboardContainer
}

export function createDashboardServices(
  config: AppConfig,
  core: CoreServices,
  remote: RemoteApis,
): DashboardServices {
  const container = new DashboardContainer(core.sync, {
    api: remote.dashboardApi,
    staleThresholdMs: config.cache.staleThresholdMs,
    backgroundRefreshMs: config.refresh.backgroundRefreshMs,
  })

  return { container }
}
