import { type Clock, SystemClock } from "@screensync/clock"
import { type Logger, PinoLogger } from "@screensync/logger"
import { createSyncCore, type IdGenerator, nanoidIds, prefixedIds, type SyncCore } from "@screensync/state-sync"
import type { AppConfig } from "../config"

export type CoreServices = {
  clock: Clock
  logger: Logger
  /** Local ids for optimistic entries. */
  ids: IdGenerator
  sync: SyncCore
}

/** Replacements for the collaborators the sync core is built from. */
export type CoreOverrides = Partial<Omit<CoreServices, "sync">>

export function createCoreServices(config: AppConfig, overrides: CoreOverrides = {}): CoreServices {
  const clock = overrides.clock ?? new SystemClock()

  const logger =
    overrides.logger ??
    new PinoLogger(
      {},
      {
        level: config.logging.level,
        prettify: config.logging.prettify,
      },
    ).child({ service: config.app.serviceName, env: config.app.env })

  const ids = overrides.ids ?? prefixedIds("local", nanoidIds())

  const sync = createSyncCore(config, { clock, logger })

  return { clock, logger, ids, sync }
}
