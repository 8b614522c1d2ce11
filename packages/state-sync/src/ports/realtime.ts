export type RealtimeUpdate<T> = (data: T | null) => T | null

export interface RealtimeSubscription {
  close(): Promise<void>
}

/**
 * Push channel a screen subscribes to while it is visible.
 */
export interface RealtimeChannel<T> {
  open(push: (update: RealtimeUpdate<T>) => void, signal: AbortSignal): Promise<RealtimeSubscription>
}
