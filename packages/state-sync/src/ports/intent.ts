import type { Milliseconds } from "@screensync/clock"
import type { SyncError } from "../errors/sync-error"
import type { OptimisticMutation } from "./optimistic"
import type { RemoteCall } from "./remote-call"

export type ScreenIntent<T, TItem = never> =
  | { type: "load"; forceRefresh?: boolean; cacheOnly?: boolean }
  | { type: "refresh"; silent?: boolean; forceRefresh?: boolean }
  | { type: "retry" }
  | { type: "select_item"; id: string }
  | { type: "send_optimistic"; mutation: OptimisticMutation<T, TItem> }
  | { type: "debounced_signal"; key: string; send: RemoteCall<void>; windowMs?: Milliseconds }
  | { type: "connect" }
  | { type: "disconnect" }
  | { type: "clear_cache" }
  | { type: "resume" }
  | { type: "pause" }

export type SkipReason =
  | "duplicate_operation"
  | "debounced"
  | "disposed"
  | "fresh"
  | "unsupported"
  | "already_connected"
  | "not_connected"

export type DispatchOutcome =
  | { kind: "completed"; source: "cache" | "network" | "local" }
  | { kind: "skipped"; reason: SkipReason }
  | { kind: "failed"; error: SyncError }
  | { kind: "abandoned" }
