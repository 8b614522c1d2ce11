import type { Clock, Milliseconds } from "@screensync/clock"
import { type Logger, NullLogger } from "@screensync/logger"
import type { SyncConfig } from "../config/sync-config"
import { MemoryDebounceGate } from "../adapters/memory/memory-debounce-gate"
import { MemoryOperationCache } from "../adapters/memory/memory-operation-cache"
import { MemoryOperationTracker } from "../adapters/memory/memory-operation-tracker"
import { InsertionOrderEntryMap } from "../core/eviction/insertion-order-entry-map"
import { LruEntryMap } from "../core/eviction/lru-entry-map"
import { OptimisticUpdateCoordinator } from "../core/optimistic/optimistic-update-coordinator"
import { passthroughPolicy } from "../core/policy/passthrough-policy"
import { createTimeoutPolicy } from "../core/policy/timeout-policy"
import { StreamingProgressiveLoader } from "../core/progressive/streaming-progressive-loader"
import type { CacheEntry } from "../ports/cache-entry"
import type { DebounceGate } from "../ports/debounce-gate"
import type { OperationCache } from "../ports/operation-cache"
import type { OperationTracker } from "../ports/operation-tracker"
import type { OptimisticCoordinator } from "../ports/optimistic"
import type { ProgressiveLoader } from "../ports/progressive-loader"
import type { CallPolicy } from "../ports/remote-call"

export type ScreenDefaults = {
  staleThresholdMs: Milliseconds
  backgroundRefreshMs: Milliseconds
  debounceWindowMs: Milliseconds
}

/**
 * Collaborators shared by every screen of an app. Screens built from one core
 * see one cache and one tracker.
 */
export type SyncCore = {
  clock: Clock
  logger: Logger
  cache: OperationCache
  tracker: OperationTracker
  gate: DebounceGate
  loader: ProgressiveLoader
  optimistic: OptimisticCoordinator
  policy: CallPolicy
  defaults: ScreenDefaults
}

export type SyncCoreDeps = {
  clock: Clock
  /** Defaults to a logger that drops everything. */
  logger?: Logger
  /** Replaces the policy derived from `config.calls`. */
  policy?: CallPolicy
}

export function createSyncCore(config: SyncConfig, deps: SyncCoreDeps): SyncCore {
  const { clock, logger = new NullLogger() } = deps
  const { maxEntries } = config.cache

  const cache = new MemoryOperationCache(
    {
      clock,
      store: maxEntries === undefined ? new InsertionOrderEntryMap<CacheEntry<unknown>>() : new LruEntryMap<CacheEntry<unknown>>(),
    },
    { ...(maxEntries !== undefined && { maxEntries }) },
  )

  const policy =
    deps.policy ??
    (config.calls.timeoutMs === undefined
      ? passthroughPolicy
      : createTimeoutPolicy({ clock }, { timeoutMs: config.calls.timeoutMs }))

  return {
    clock,
    logger,
    cache,
    tracker: new MemoryOperationTracker({ clock }),
    gate: new MemoryDebounceGate({ clock }),
    loader: new StreamingProgressiveLoader({ logger }),
    optimistic: new OptimisticUpdateCoordinator({ logger }),
    policy,
    defaults: {
      staleThresholdMs: config.cache.staleThresholdMs,
      backgroundRefreshMs: config.refresh.backgroundRefreshMs,
      debounceWindowMs: config.signals.debounceWindowMs,
    },
  }
}
