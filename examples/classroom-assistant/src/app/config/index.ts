import { loadSyncConfig, type SyncConfig, type SyncEnv } from "@screensync/state-sync"

export type AppConfig = SyncConfig

export type AppConfigOverrides = Partial<Record<keyof SyncEnv, unknown>>

/**
 * Reads `.env` from the project root when present, then `SYNC_*` variables.
 */
export function loadAppConfig(
  env: Record<string, string | undefined>,
  overrides: AppConfigOverrides = {},
  projectRoot?: string,
): Promise<AppConfig> {
  return loadSyncConfig({
    env,
    overrides,
    file: ".env",
    ...(projectRoot !== undefined && { cwd: projectRoot }),
  })
}
