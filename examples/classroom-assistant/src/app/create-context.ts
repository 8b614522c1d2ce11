import { fileURLToPath } from "node:url"
import { type AppConfig, type AppConfigOverrides, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices } from "./services"
import { type CoreOverrides, createCoreServices } from "./services/core"
import { createDefaultRemoteApis, type RemoteApis } from "./services/remote"

export type AppContextOptions = {
  env?: Record<string, string | undefined>
  configOverrides?: AppConfigOverrides
  coreOverrides?: CoreOverrides
  remoteOverrides?: Partial<RemoteApis>
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(options.env ?? process.env, options.configOverrides, projectRoot)

  const core = createCoreServices(config, options.coreOverrides)

  const remote = { ...createDefaultRemoteApis(core), ...options.remoteOverrides }

  const domains = createDefaultDomainServices(config, core, remote)

  return {
    config,
    services: { core, remote, domains },
    createStartHooks,
    createStopHooks,
  }
}
