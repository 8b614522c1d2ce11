export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export { nanoidIds, prefixedIds } from "./adapters/id/nanoid-ids"
export { sequentialIds } from "./adapters/id/sequential-ids"
export { MemoryDebounceGate } from "./adapters/memory/memory-debounce-gate"
export {
  MemoryOperationCache,
  type MemoryOperationCacheDeps,
  type MemoryOperationCacheOptions,
} from "./adapters/memory/memory-operation-cache"
export { MemoryOperationTracker } from "./adapters/memory/memory-operation-tracker"
export {
  createSyncCore,
  type ScreenDefaults,
  type SyncCore,
  type SyncCoreDeps,
} from "./composition/create-sync-core"
export { type LoadSyncConfigOptions, loadSyncConfig } from "./config/load-sync-config"
export { type SyncEnv, syncEnvSchema } from "./config/schema"
export { mapEnvToConfig, type SyncConfig } from "./config/sync-config"
export {
  type KeyedFetchOptions,
  type KeyedResult,
  type LoadOptions,
  type RefreshOptions,
  StateContainer,
  type StateContainerDeps,
  type StateContainerOptions,
} from "./core/container/state-container"
export type { EntryMap } from "./core/eviction/entry-map"
export { InsertionOrderEntryMap } from "./core/eviction/insertion-order-entry-map"
export { LruEntryMap } from "./core/eviction/lru-entry-map"
export { isTentative, removeEntry, upsertEntry } from "./core/optimistic/optimistic-entries"
export { OptimisticUpdateCoordinator } from "./core/optimistic/optimistic-update-coordinator"
export { directPlan } from "./core/plans/direct-plan"
export { type ProgressivePlanOptions, progressivePlan } from "./core/plans/progressive-plan"
export { passthroughPolicy } from "./core/policy/passthrough-policy"
export { createTimeoutPolicy, type TimeoutPolicyOptions } from "./core/policy/timeout-policy"
export { StreamingProgressiveLoader } from "./core/progressive/streaming-progressive-loader"
export { initialScreenState, isStale, needsRefresh, phaseOf } from "./core/screen-state"
export {
  isSyncError,
  type SerializedSyncError,
  SyncError,
  type SyncErrorCode,
  serializeSyncError,
  toSyncError,
} from "./errors/sync-error"
export type { CacheEntry } from "./ports/cache-entry"
export type { ConfigSource } from "./ports/config-source"
export type { DebounceGate } from "./ports/debounce-gate"
export type { FetchContext, FetchPlan } from "./ports/fetch-plan"
export type { IdGenerator } from "./ports/id-generator"
export type { DispatchOutcome, ScreenIntent, SkipReason } from "./ports/intent"
export type { NoticeListener, ScreenNotice } from "./ports/notice"
export type { CacheStats, OperationCache } from "./ports/operation-cache"
export type { OperationHandle, OperationTracker, TrackResult } from "./ports/operation-tracker"
export type {
  OptimisticCoordinator,
  OptimisticEntry,
  OptimisticMutation,
  OptimisticOutcome,
  Reconcile,
} from "./ports/optimistic"
export type { ProgressiveLoader, ProgressiveRunOptions } from "./ports/progressive-loader"
export type { RealtimeChannel, RealtimeSubscription, RealtimeUpdate } from "./ports/realtime"
export type { CallPolicy, RemoteCall } from "./ports/remote-call"
export type { ScreenPhase, ScreenState, StateListener, Unsubscribe } from "./ports/screen-state"
export type { PartialResult, Tier, TierList, TierName, TierOutcome, TierPriority } from "./ports/tier"
