import type { Milliseconds } from "@screensync/clock"
import type { Logger } from "@screensync/logger"
import type { SyncCore } from "../../composition/create-sync-core"
import { SyncError, toSyncError } from "../../errors/sync-error"
import type { CacheEntry } from "../../ports/cache-entry"
import type { FetchPlan } from "../../ports/fetch-plan"
import type { DispatchOutcome, ScreenIntent, SkipReason } from "../../ports/intent"
import type { NoticeListener, ScreenNotice } from "../../ports/notice"
import type { OptimisticMutation } from "../../ports/optimistic"
import type { RealtimeChannel, RealtimeSubscription, RealtimeUpdate } from "../../ports/realtime"
import type { RemoteCall } from "../../ports/remote-call"
import type { ScreenState, StateListener, Unsubscribe } from "../../ports/screen-state"
import { initialScreenState, isStale, needsRefresh } from "../screen-state"

export type StateContainerDeps = SyncCore

export type StateContainerOptions<T> = {
  /** Cache and tracker key of the screen; sub-resource keys are prefixed with it. */
  screenKey: string
  plan: FetchPlan<T>
  realtime?: RealtimeChannel<T>
  staleThresholdMs?: Milliseconds
  /** 0 disables background refresh. */
  backgroundRefreshMs?: Milliseconds
  debounceWindowMs?: Milliseconds
}

export type LoadOptions = {
  /** Skip the fresh-cache short-circuit. */
  forceRefresh?: boolean
  /** Serve any cached entry, even a stale one, and never fetch. */
  cacheOnly?: boolean
}

export type RefreshOptions = {
  /** Fetch without loading chrome. */
  silent?: boolean
  forceRefresh?: boolean
}

export type KeyedFetchOptions = {
  forceRefresh?: boolean
  staleThresholdMs?: Milliseconds
}

export type KeyedResult<V> =
  | { kind: "value"; value: V; fromCache: boolean }
  | { kind: "skipped" }
  | { kind: "failed"; error: SyncError }

type SyncMode = {
  forceRefresh: boolean
  cacheOnly: boolean
  silent: boolean
}

type OpenRealtime = {
  subscription: RealtimeSubscription
  controller: AbortController
}

type BackgroundRefresh = {
  controller: AbortController
  loop: Promise<void>
}

const skipped = (reason: SkipReason): DispatchOutcome => ({ kind: "skipped", reason })

/**
 * Owns one screen's `ScreenState` and turns intents into state transitions.
 *
 * Screens subclass it to add their own intents and to handle `select_item`.
 * Every remote call goes through the shared core's call policy; the cache and
 * tracker are shared with every other screen built from the same core.
 */
export class StateContainer<T, TItem = never> {
  protected readonly logger: Logger

  private state: ScreenState<T> = initialScreenState<T>()
  private readonly listeners = new Set<StateListener<T>>()
  private readonly noticeListeners = new Set<NoticeListener>()
  private readonly liveMutations = new Set<string>()
  private readonly lifetime = new AbortController()
  private background: BackgroundRefresh | undefined
  private realtime: OpenRealtime | undefined
  private reconnectOnResume = false

  constructor(
    protected readonly deps: StateContainerDeps,
    protected readonly opts: StateContainerOptions<T>,
  ) {
    this.logger = deps.logger.child({ module: "state-container", screen: opts.screenKey })
  }

  get screenKey(): string {
    return this.opts.screenKey
  }

  get isDisposed(): boolean {
    return this.lifetime.signal.aborted
  }

  getState(): ScreenState<T> {
    return this.state
  }

  isStale(): boolean {
    return isStale(this.state, this.deps.clock.nowMs(), this.staleThresholdMs)
  }

  /** Listeners run synchronously on every state change. */
  subscribe(listener: StateListener<T>): Unsubscribe {
    this.listeners.add(listener)

    return () => {
      this.listeners.delete(listener)
    }
  }

  onNotice(listener: NoticeListener): Unsubscribe {
    this.noticeListeners.add(listener)

    return () => {
      this.noticeListeners.delete(listener)
    }
  }

  dispatch(intent: ScreenIntent<T, TItem>): Promise<DispatchOutcome> {
    switch (intent.type) {
      case "load":
        return this.load(intent)
      case "refresh":
        return this.refresh(intent)
      case "retry":
        return this.retry()
      case "select_item":
        return this.isDisposed ? Promise.resolve(skipped("disposed")) : this.selectItem(intent.id)
      case "send_optimistic":
        return this.sendOptimistic(intent.mutation)
      case "debounced_signal":
        return this.signal(intent.key, intent.send, intent.windowMs)
      case "connect":
        return this.connect()
      case "disconnect":
        return this.disconnect()
      case "clear_cache":
        return Promise.resolve(this.clearCache())
      case "resume":
        return this.onResume()
      case "pause":
        return this.onPause().then((): DispatchOutcome => ({ kind: "completed", source: "local" }))
      default: {
        const unreachable: never = intent
        return unreachable
      }
    }
  }

  load(opts: LoadOptions = {}): Promise<DispatchOutcome> {
    return this.sync({
      forceRefresh: opts.forceRefresh ?? false,
      cacheOnly: opts.cacheOnly ?? false,
      silent: false,
    })
  }

  refresh(opts: RefreshOptions = {}): Promise<DispatchOutcome> {
    return this.sync({
      forceRefresh: opts.forceRefresh ?? true,
      cacheOnly: false,
      silent: opts.silent ?? false,
    })
  }

  retry(): Promise<DispatchOutcome> {
    return this.sync({ forceRefresh: true, cacheOnly: false, silent: false })
  }

  /**
   * First load of a visible screen. Also starts background refresh and the
   * realtime subscription when one is configured.
   */
  async start(): Promise<DispatchOutcome> {
    if (this.isDisposed) return skipped("disposed")

    this.startBackgroundRefresh()

    const [outcome] = await Promise.all([
      this.load(),
      this.opts.realtime ? this.connect() : Promise.resolve(skipped("unsupported")),
    ])

    return outcome
  }

  async onResume(): Promise<DispatchOutcome> {
    if (this.isDisposed) return skipped("disposed")

    this.startBackgroundRefresh()

    const reconnect = this.reconnectOnResume ? this.connect() : Promise.resolve(skipped("not_connected"))
    this.reconnectOnResume = false

    const refresh = this.isStale()
      ? this.refresh({ silent: true, forceRefresh: false })
      : Promise.resolve(skipped("fresh"))

    const [outcome] = await Promise.all([refresh, reconnect])

    return outcome
  }

  async onPause(): Promise<void> {
    await this.stopBackgroundRefresh()

    if (this.realtime) {
      this.reconnectOnResume = true
      await this.disconnect()
    }
  }

  /**
   * Abandon in-flight work, close the realtime subscription and stop timers.
   * Results that arrive afterwards change nothing.
   */
  async dispose(): Promise<void> {
    if (this.isDisposed) return

    this.lifetime.abort()
    this.liveMutations.clear()

    await this.stopBackgroundRefresh()

    const realtime = this.realtime
    this.realtime = undefined
    if (realtime) await this.closeRealtime(realtime)

    this.listeners.clear()
    this.noticeListeners.clear()
  }

  async sendOptimistic(mutation: OptimisticMutation<T, TItem>): Promise<DispatchOutcome> {
    if (this.isDisposed) return skipped("disposed")

    const key = `${this.screenKey}:mutation:${mutation.id}`
    if (!this.deps.tracker.begin(key)) return skipped("duplicate_operation")

    this.liveMutations.add(mutation.id)
    const submittedAt = this.deps.clock.nowMs()

    try {
      const outcome = await this.deps.optimistic.apply(
        mutation.tentative,
        () => this.invoke(key, mutation.remoteCall),
        (value, isOptimistic) => {
          if (isOptimistic) {
            this.update((data) => mutation.place(data, { state: "tentative", id: mutation.id, value, submittedAt }))
            return
          }

          if (!this.liveMutations.has(mutation.id)) {
            this.logger.debug("confirmation discarded", {
              key,
              err: SyncError.reconciliationMismatch(mutation.id),
            })
            return
          }

          const confirmedAt = this.deps.clock.nowMs()
          this.update((data) => mutation.place(data, { state: "confirmed", id: mutation.id, value, confirmedAt }))
        },
        { key },
      )

      const wasLive = this.liveMutations.delete(mutation.id)

      if (outcome.kind === "committed") {
        for (const stale of mutation.invalidates ?? []) this.deps.cache.invalidate(stale)

        return wasLive ? { kind: "completed", source: "network" } : { kind: "abandoned" }
      }

      if (!wasLive) return { kind: "abandoned" }

      this.update((data) => (data === null ? data : mutation.remove(data, mutation.id)))
      this.notify({ kind: "mutation_failed", mutationId: mutation.id, error: outcome.error })

      return { kind: "failed", error: outcome.error }
    } finally {
      this.deps.tracker.end(key)
    }
  }

  /**
   * Send an advisory signal at most once per window. Failures are logged and
   * never touch screen state.
   */
  async signal(key: string, send: RemoteCall<void>, windowMs?: Milliseconds): Promise<DispatchOutcome> {
    if (this.isDisposed) return skipped("disposed")

    const signalKey = `${this.screenKey}:${key}`
    if (!this.deps.gate.allow(signalKey, windowMs ?? this.debounceWindowMs)) return skipped("debounced")

    try {
      await this.invoke(signalKey, send)
      return { kind: "completed", source: "network" }
    } catch (err) {
      const error = toSyncError(err, signalKey)
      this.logger.warn("signal failed", { key: signalKey, err: error })

      return { kind: "failed", error }
    }
  }

  async connect(): Promise<DispatchOutcome> {
    const channel = this.opts.realtime

    if (this.isDisposed) return skipped("disposed")
    if (!channel) return skipped("unsupported")
    if (this.realtime) return skipped("already_connected")

    const key = `${this.screenKey}:realtime`
    const controller = new AbortController()

    try {
      const result = await this.deps.tracker.track(key, () =>
        channel.open((update) => this.applyRealtime(controller.signal, update), controller.signal),
      )

      if (result.kind === "skipped") return skipped("duplicate_operation")

      if (this.isDisposed) {
        await this.closeRealtime({ subscription: result.value, controller })
        return { kind: "abandoned" }
      }

      this.realtime = { subscription: result.value, controller }
      this.commit({ isConnected: true })
      this.logger.debug("realtime connected", { key })

      return { kind: "completed", source: "network" }
    } catch (err) {
      const error = toSyncError(err, key)
      this.logger.warn("realtime connect failed", { key, err: error })

      return { kind: "failed", error }
    }
  }

  async disconnect(): Promise<DispatchOutcome> {
    const realtime = this.realtime
    if (!realtime) return skipped("not_connected")

    this.realtime = undefined
    this.commit({ isConnected: false })
    await this.closeRealtime(realtime)

    return { kind: "completed", source: "local" }
  }

  /** Drop the screen's own entry and every sub-resource entry under its key. */
  clearCache(): DispatchOutcome {
    this.deps.cache.invalidate(this.screenKey)
    const removed = this.deps.cache.invalidatePrefix(`${this.screenKey}:`)
    this.logger.debug("cache cleared", { key: this.screenKey, removed: removed + 1 })

    return { kind: "completed", source: "local" }
  }

  /** Handles `select_item`. Screens without selectable items keep the default. */
  protected selectItem(_id: string): Promise<DispatchOutcome> {
    return Promise.resolve(skipped("unsupported"))
  }

  /**
   * Cached, deduplicated fetch of a sub-resource. A fresh cached value is
   * returned without calling out; a successful call is written to the cache.
   */
  protected async fetchKeyed<V>(
    key: string,
    call: RemoteCall<V>,
    opts: KeyedFetchOptions = {},
  ): Promise<KeyedResult<V>> {
    const thresholdMs = opts.staleThresholdMs ?? this.staleThresholdMs

    try {
      const result = await this.deps.tracker.track(key, async (): Promise<KeyedResult<V>> => {
        const cached = this.deps.cache.get<V>(key)

        if (cached && !opts.forceRefresh && !this.deps.cache.isStale(key, thresholdMs)) {
          this.logger.debug("served from cache", { key })
          return { kind: "value", value: cached.value, fromCache: true }
        }

        const value = await this.invoke(key, call)
        this.deps.cache.put(key, value)

        return { kind: "value", value, fromCache: false }
      })

      return result.kind === "skipped" ? { kind: "skipped" } : result.value
    } catch (err) {
      const error = toSyncError(err, key)
      this.logger.warn("keyed fetch failed", { key, err: error })

      return { kind: "failed", error }
    }
  }

  /** Apply a change to the data on screen. No-op once disposed. */
  protected update(change: (data: T | null) => T | null): void {
    this.commit({ data: change(this.state.data) })
  }

  /**
   * Forget every optimistic mutation still in flight. Their confirmations and
   * failures will change nothing.
   */
  protected discardPendingMutations(): void {
    this.liveMutations.clear()
  }

  protected notify(notice: ScreenNotice): void {
    if (this.isDisposed) return

    for (const listener of this.noticeListeners) listener(notice)
  }

  private get staleThresholdMs(): Milliseconds {
    return this.opts.staleThresholdMs ?? this.deps.defaults.staleThresholdMs
  }

  private get debounceWindowMs(): Milliseconds {
    return this.opts.debounceWindowMs ?? this.deps.defaults.debounceWindowMs
  }

  private invoke<V>(key: string, call: RemoteCall<V>): Promise<V> {
    return this.deps.policy(key, call, this.lifetime.signal)
  }

  private async sync(mode: SyncMode): Promise<DispatchOutcome> {
    if (this.isDisposed) return skipped("disposed")

    const key = this.screenKey

    if (!this.deps.tracker.begin(key)) {
      this.logger.debug("load skipped", { key, outcome: "duplicate_operation" })
      return skipped("duplicate_operation")
    }

    try {
      if (mode.cacheOnly) return this.serveCacheOnly(key)

      if (!mode.forceRefresh && !this.deps.cache.isStale(key, this.staleThresholdMs)) {
        const entry = this.deps.cache.get<T>(key)

        if (entry) {
          this.showCached(entry)
          this.logger.debug("served from cache", { key })

          return { kind: "completed", source: "cache" }
        }
      }

      return await this.fetchIntoState(key, mode)
    } finally {
      this.deps.tracker.end(key)
    }
  }

  private serveCacheOnly(key: string): DispatchOutcome {
    const entry = this.deps.cache.get<T>(key)

    if (entry) {
      this.showCached(entry)
      return { kind: "completed", source: "cache" }
    }

    const error = SyncError.staleData(key)
    this.commit({ isLoading: false, isRefreshing: false, error })

    return { kind: "failed", error }
  }

  private async fetchIntoState(key: string, mode: SyncMode): Promise<DispatchOutcome> {
    const startedAt = this.deps.clock.nowMs()

    if (!mode.silent) {
      const hasData = this.state.data !== null
      this.commit({ isLoading: !hasData, isRefreshing: hasData, error: null })
    }

    let data: T
    let published = false
    try {
      data = await this.opts.plan.run({
        key,
        signal: this.lifetime.signal,
        base: this.deps.cache.get<T>(key)?.value ?? null,
        policy: this.deps.policy,
        publish: (change) => {
          published = true
          this.update(change)
        },
      })
    } catch (err) {
      if (this.isDisposed) return { kind: "abandoned" }

      return this.recover(key, toSyncError(err, key), mode)
    }

    if (this.isDisposed) return { kind: "abandoned" }

    this.deps.cache.put(key, data)
    this.commit({
      isLoading: false,
      isRefreshing: false,
      data: published ? this.state.data : data,
      error: null,
      lastUpdated: this.deps.clock.nowMs(),
      isFromCache: false,
    })
    this.logger.debug("screen data loaded", {
      key,
      outcome: mode.silent ? "silent_refresh" : "network",
      durationMs: this.deps.clock.nowMs() - startedAt,
    })

    return { kind: "completed", source: "network" }
  }

  /**
   * A failed fetch falls back to the cached entry when there is one. A silent
   * refresh that fails leaves visible data untouched.
   */
  private recover(key: string, error: SyncError, mode: SyncMode): DispatchOutcome {
    this.logger.warn(mode.silent ? "silent refresh failed" : "screen data fetch failed", { key, err: error })

    if (mode.silent && this.state.data !== null) return { kind: "failed", error }

    const fallback = this.deps.cache.get<T>(key)

    if (fallback) {
      this.showCached(fallback)
      if (!mode.silent) this.notify({ kind: "served_from_cache", key, error })

      return { kind: "failed", error }
    }

    this.commit({ isLoading: false, isRefreshing: false, error })

    return { kind: "failed", error }
  }

  private showCached(entry: CacheEntry<T>): void {
    this.commit({
      isLoading: false,
      isRefreshing: false,
      data: entry.value,
      error: null,
      lastUpdated: entry.writtenAt,
      isFromCache: true,
    })
  }

  private applyRealtime(signal: AbortSignal, update: RealtimeUpdate<T>): void {
    if (signal.aborted) {
      this.logger.debug("realtime update after close dropped", { key: this.screenKey })
      return
    }

    this.update(update)
  }

  private async closeRealtime(realtime: OpenRealtime): Promise<void> {
    realtime.controller.abort()

    try {
      await realtime.subscription.close()
    } catch (err) {
      this.logger.warn("realtime close failed", { key: this.screenKey, err })
    }
  }

  private startBackgroundRefresh(): void {
    const periodMs = this.opts.backgroundRefreshMs ?? this.deps.defaults.backgroundRefreshMs

    if (periodMs <= 0 || this.background || this.isDisposed) return

    const controller = new AbortController()
    this.background = { controller, loop: this.runBackgroundRefresh(periodMs, controller.signal) }
  }

  private async stopBackgroundRefresh(): Promise<void> {
    const background = this.background
    if (!background) return

    this.background = undefined
    background.controller.abort()
    await background.loop
  }

  private async runBackgroundRefresh(periodMs: Milliseconds, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.deps.clock.sleep(periodMs, signal)
        if (signal.aborted) return

        if (needsRefresh(this.state, this.deps.clock.nowMs(), this.staleThresholdMs)) {
          await this.refresh({ silent: true, forceRefresh: false })
        }
      }
    } catch (err) {
      this.logger.error("background refresh stopped", { key: this.screenKey, err })
    }
  }

  private commit(patch: Partial<ScreenState<T>>): void {
    if (this.isDisposed) return

    this.state = Object.freeze({ ...this.state, ...patch })

    for (const listener of this.listeners) listener(this.state)
  }
}
