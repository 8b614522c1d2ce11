import { z } from "zod"
import { DotenvSource } from "../adapters/config/dotenv-source"
import { EnvSource } from "../adapters/config/env-source"
import { ObjectSource } from "../adapters/config/object-source"
import { SyncError } from "../errors/sync-error"
import type { ConfigSource } from "../ports/config-source"
import { type SyncEnv, syncEnvSchema } from "./schema"
import { mapEnvToConfig, type SyncConfig } from "./sync-config"

export type LoadSyncConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** @default "SYNC_" */
  prefix?: string
  /** Optional dotenv file read before the environment, e.g. `.env.${NODE_ENV}`. */
  file?: string
  cwd?: string
  /** Applied last, keyed like the unprefixed variables. */
  overrides?: Partial<Record<keyof SyncEnv, unknown>>
}

/**
 * Build the sync configuration from, in increasing precedence: the dotenv file,
 * the process environment and `overrides`.
 *
 * @throws SyncError `invalid_config` listing every invalid variable
 */
export async function loadSyncConfig(opts: LoadSyncConfigOptions = {}): Promise<SyncConfig> {
  const prefix = opts.prefix ?? "SYNC_"

  const sources: ConfigSource[] = [
    ...(opts.file === undefined
      ? []
      : [new DotenvSource({ file: opts.file, required: false, prefix, ...(opts.cwd !== undefined && { cwd: opts.cwd }) })]),
    new EnvSource({ prefix, ...(opts.env !== undefined && { env: opts.env }) }),
    new ObjectSource(opts.overrides ?? {}, "overrides"),
  ]

  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = syncEnvSchema.safeParse(merged)

  if (!result.success) {
    throw SyncError.invalidConfig(z.prettifyError(result.error))
  }

  return mapEnvToConfig(result.data)
}
