import type { SyncError } from "../errors/sync-error"

/**
 * One-shot UI events. Unlike `ScreenState`, a notice is delivered once and not retained.
 */
export type ScreenNotice =
  | { kind: "mutation_failed"; mutationId: string; error: SyncError }
  | { kind: "served_from_cache"; key: string; error: SyncError }

export type NoticeListener = (notice: ScreenNotice) => void
