import { type ChatServices, createChatServices } from "../../domains/chat/composition"
import { createDashboardServices, type DashboardServices } from "../../domains/dashboard/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { RemoteApis } from "./remote"

export type DomainServices = {
  dashboard: DashboardServices
  chat: ChatServices
}

export type AppServices = {
  core: CoreServices
  remote: RemoteApis
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  core: CoreServices,
  remote: RemoteApis,
): DomainServices {
  return {
    dashboard: createDashboardServices(config, core, remote),
    chat: createChatServices(config, core, remote),
  }
}
