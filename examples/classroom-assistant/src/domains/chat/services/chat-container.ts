import type { Milliseconds } from "@screensync/clock"
import {
  type DispatchOutcome,
  type IdGenerator,
  progressivePlan,
  removeEntry,
  StateContainer,
  type SyncCore,
  upsertEntry,
} from "@screensync/state-sync"
import type { ChatApi } from "../api/chat.api"
import { CHAT_KEY, chatConversationKey, TYPING_SIGNAL } from "../keyspace"
import { type ChatData, type ChatMessage, emptyChat } from "../model/chat.model"
import {
  type ChatSelection,
  chatRealtime,
  chatTiers,
  mergeChatTier,
  seedChat,
  showConversation,
  withFailedSection,
} from "./chat-data"

export type ChatContainerOptions = {
  api: ChatApi
  /** Local ids for optimistic messages. */
  ids: IdGenerator
  conversationId: string
  staleThresholdMs?: Milliseconds
  backgroundRefreshMs?: Milliseconds
  debounceWindowMs?: Milliseconds
}

export class ChatContainer extends StateContainer<ChatData, ChatMessage> {
  private readonly api: ChatApi
  private readonly ids: IdGenerator
  private readonly selection: ChatSelection

  constructor(deps: SyncCore, opts: ChatContainerOptions) {
    const selection: ChatSelection = { conversationId: opts.conversationId }

    super(deps, {
      screenKey: CHAT_KEY,
      plan: progressivePlan({
        loader: deps.loader,
        tiers: chatTiers(opts.api, selection),
        seed: seedChat(selection),
        merge: mergeChatTier(selection),
      }),
      realtime: chatRealtime(opts.api),
      staleThresholdMs: opts.staleThresholdMs,
      backgroundRefreshMs: opts.backgroundRefreshMs,
      debounceWindowMs: opts.debounceWindowMs,
    })

    this.api = opts.api
    this.ids = opts.ids
    this.selection = selection
  }

  get conversationId(): string {
    return this.selection.conversationId
  }

  /**
   * Show `text` at once and send it. A failed send removes the message again and
   * raises a `mutation_failed` notice.
   */
  sendMessage(text: string): Promise<DispatchOutcome> {
    const id = this.ids.generate()
    const conversationId = this.selection.conversationId

    const tentative: ChatMessage = {
      id,
      conversationId,
      text,
      author: "user",
      sentAt: this.deps.clock.nowMs(),
      clientId: id,
    }

    return this.dispatch({
      type: "send_optimistic",
      mutation: {
        id,
        tentative,
        remoteCall: (signal) => this.api.sendMessage({ clientId: id, conversationId, text }, signal),
        place: (data, entry) => {
          const current = data ?? emptyChat(conversationId)
          return { ...current, messages: upsertEntry(current.messages, entry) }
        },
        remove: (data, entryId) => ({ ...data, messages: removeEntry(data.messages, entryId) }),
        invalidates: [CHAT_KEY, chatConversationKey(conversationId)],
      },
    })
  }

  /** Tell the other side the user is typing, at most once per debounce window. */
  setTyping(): Promise<DispatchOutcome> {
    const conversationId = this.selection.conversationId

    return this.dispatch({
      type: "debounced_signal",
      key: TYPING_SIGNAL,
      send: (signal) => this.api.sendTyping(conversationId, signal),
    })
  }

  /** Switch to another conversation. Sends still in flight are forgotten. */
  protected async selectItem(conversationId: string): Promise<DispatchOutcome> {
    if (conversationId !== this.selection.conversationId) {
      this.discardPendingMutations()
      this.selection.conversationId = conversationId
      this.update((data) => showConversation(data ?? emptyChat(conversationId), conversationId, []))
    }

    const result = await this.fetchKeyed(chatConversationKey(conversationId), (signal) =>
      this.api.fetchMessages(conversationId, signal),
    )

    if (this.selection.conversationId !== conversationId) return { kind: "abandoned" }

    switch (result.kind) {
      case "skipped":
        return { kind: "skipped", reason: "duplicate_operation" }

      case "failed":
        this.update((data) => (data === null ? data : withFailedSection(data, "messages")))
        return { kind: "failed", error: result.error }

      case "value":
        this.update((data) =>
          showConversation(data ?? emptyChat(conversationId), conversationId, result.value.messages),
        )
        return { kind: "completed", source: result.fromCache ? "cache" : "network" }
    }
  }
}
