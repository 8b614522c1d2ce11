import type { Milliseconds } from "@screensync/clock"
import type { LogLevelName } from "@screensync/logger"
import type { SyncEnv } from "./schema"

export type SyncConfig = {
  app: {
    env: string
    serviceName: string
  }
  cache: {
    staleThresholdMs: Milliseconds
    /** Unset keeps every entry. */
    maxEntries?: number
  }
  refresh: {
    /** 0 disables background refresh. */
    backgroundRefreshMs: Milliseconds
  }
  signals: {
    debounceWindowMs: Milliseconds
  }
  calls: {
    /** Unset applies no timeout. */
    timeoutMs?: Milliseconds
  }
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

export function mapEnvToConfig(env: SyncEnv): SyncConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    cache: {
      staleThresholdMs: env.STALE_THRESHOLD_MS,
      ...(env.CACHE_MAX_ENTRIES !== undefined && { maxEntries: env.CACHE_MAX_ENTRIES }),
    },
    refresh: {
      backgroundRefreshMs: env.BACKGROUND_REFRESH_MS,
    },
    signals: {
      debounceWindowMs: env.TYPING_DEBOUNCE_MS,
    },
    calls: {
      ...(env.CALL_TIMEOUT_MS !== undefined && { timeoutMs: env.CALL_TIMEOUT_MS }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}
