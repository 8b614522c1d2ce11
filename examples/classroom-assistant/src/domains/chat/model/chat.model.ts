import type { Milliseconds } from "@screensync/clock"
import type { OptimisticEntry } from "@screensync/state-sync"

export type MessageAuthor = "user" | "assistant"

export type ChatMessage = {
  id: string
  conversationId: string
  text: string
  author: MessageAuthor
  sentAt: Milliseconds
  /** Local id the sender gave the message before the server assigned `id`. */
  clientId?: string
}

export type MessageDraft = {
  clientId: string
  conversationId: string
  text: string
}

export type Conversation = {
  id: string
  title: string
  updatedAt: Milliseconds
}

export type ChatSettings = {
  language: string
  responseStyle: "concise" | "detailed"
}

export type ConversationMessages = {
  conversationId: string
  messages: ChatMessage[]
}

/** What each chat tier loads. */
export type ChatTiers = {
  conversations: Conversation[]
  messages: ConversationMessages
  settings: ChatSettings
}

export type ChatSection = keyof ChatTiers

export type ChatData = {
  conversations: Conversation[]
  activeConversationId: string
  messages: OptimisticEntry<ChatMessage>[]
  settings: ChatSettings | null
  failedSections: readonly ChatSection[]
}

export function emptyChat(conversationId: string): ChatData {
  return {
    conversations: [],
    activeConversationId: conversationId,
    messages: [],
    settings: null,
    failedSections: [],
  }
}
