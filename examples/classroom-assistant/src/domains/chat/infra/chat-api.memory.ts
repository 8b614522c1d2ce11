import type { TimeSource } from "@screensync/clock"
import type { IdGenerator, RealtimeSubscription } from "@screensync/state-sync"
import type { ChatApi, IncomingMessageListener } from "../api/chat.api"
import type {
  ChatMessage,
  ChatSettings,
  Conversation,
  ConversationMessages,
  MessageDraft,
} from "../model/chat.model"

export type MemoryChatApiDeps = {
  clock: TimeSource
  /** Server-side message ids. */
  ids: IdGenerator
}

export type MemoryChatApiOptions = {
  conversations: Conversation[]
  messages: ChatMessage[]
  settings: ChatSettings
}

/**
 * In-process chat backend. `deliver()` stands in for messages posted by other
 * participants; sends can be made to fail with `rejectSendsWith()`.
 */
export class MemoryChatApi implements ChatApi {
  readonly typingSignals: string[] = []

  private readonly conversations: Conversation[]
  private readonly messages: ChatMessage[]
  private readonly settings: ChatSettings
  private readonly listeners = new Set<IncomingMessageListener>()
  private sendError: Error | undefined

  constructor(
    private readonly deps: MemoryChatApiDeps,
    opts: MemoryChatApiOptions,
  ) {
    this.conversations = [...opts.conversations]
    this.messages = [...opts.messages]
    this.settings = { ...opts.settings }
  }

  get subscriberCount(): number {
    return this.listeners.size
  }

  async listConversations(signal: AbortSignal): Promise<Conversation[]> {
    signal.throwIfAborted()
    return [...this.conversations]
  }

  async fetchMessages(conversationId: string, signal: AbortSignal): Promise<ConversationMessages> {
    signal.throwIfAborted()
    return {
      conversationId,
      messages: this.messages.filter((m) => m.conversationId === conversationId),
    }
  }

  async fetchSettings(signal: AbortSignal): Promise<ChatSettings> {
    signal.throwIfAborted()
    return { ...this.settings }
  }

  async sendMessage(draft: MessageDraft, signal: AbortSignal): Promise<ChatMessage> {
    signal.throwIfAborted()
    if (this.sendError) throw this.sendError

    const message: ChatMessage = {
      id: this.deps.ids.generate(),
      conversationId: draft.conversationId,
      text: draft.text,
      author: "user",
      sentAt: this.deps.clock.nowMs(),
      clientId: draft.clientId,
    }
    this.messages.push(message)

    return message
  }

  async sendTyping(conversationId: string, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted()
    this.typingSignals.push(conversationId)
  }

  async subscribe(listener: IncomingMessageListener, signal: AbortSignal): Promise<RealtimeSubscription> {
    signal.throwIfAborted()
    this.listeners.add(listener)

    return {
      close: async () => {
        this.listeners.delete(listener)
      },
    }
  }

  deliver(message: ChatMessage): void {
    this.messages.push(message)
    for (const listener of this.listeners) listener(message)
  }

  /** Every later send rejects with `error`; `undefined` restores sending. */
  rejectSendsWith(error: Error | undefined): void {
    this.sendError = error
  }
}
