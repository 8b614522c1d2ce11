import { logLevelNames } from "@screensync/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])
const milliseconds = z.coerce.number().int().nonnegative()

export const syncEnvSchema = z.object({
  APP_ENV: z.string().min(1).default("development"),
  SERVICE_NAME: z.string().min(1).default("classroom-assistant"),

  STALE_THRESHOLD_MS: milliseconds.default(300_000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),

  TYPING_DEBOUNCE_MS: milliseconds.default(1_000),
  BACKGROUND_REFRESH_MS: milliseconds.default(120_000),
  CALL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type SyncEnv = z.infer<typeof syncEnvSchema>
