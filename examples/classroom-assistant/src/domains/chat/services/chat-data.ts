import {
  type OptimisticEntry,
  type PartialResult,
  type RealtimeChannel,
  type TierList,
  upsertEntry,
} from "@screensync/state-sync"
import type { ChatApi } from "../api/chat.api"
import { type ChatData, type ChatMessage, type ChatSection, type ChatTiers, emptyChat } from "../model/chat.model"

/** The conversation a chat screen shows. Switching conversations mutates it. */
export type ChatSelection = {
  conversationId: string
}

export function chatTiers(api: ChatApi, selection: ChatSelection): TierList<ChatTiers> {
  return [
    { name: "conversations", priority: "primary", load: (signal) => api.listConversations(signal) },
    {
      name: "messages",
      priority: "secondary",
      load: (signal) => api.fetchMessages(selection.conversationId, signal),
    },
    { name: "settings", priority: "tertiary", load: (signal) => api.fetchSettings(signal) },
  ]
}

export function seedChat(selection: ChatSelection): (current: ChatData | null) => ChatData {
  return (current) => (current === null ? emptyChat(selection.conversationId) : { ...current, failedSections: [] })
}

function confirmed(message: ChatMessage): OptimisticEntry<ChatMessage> {
  return { state: "confirmed", id: message.id, value: message, confirmedAt: message.sentAt }
}

/**
 * Show a conversation's server messages. For the conversation already on screen,
 * entries the list does not cover yet stay at the end: sends in flight and
 * pushes that arrived after the list was read.
 */
export function showConversation(data: ChatData, conversationId: string, messages: ChatMessage[]): ChatData {
  const listed = new Set(messages.flatMap((m) => (m.clientId === undefined ? [m.id] : [m.id, m.clientId])))
  const unlisted =
    data.activeConversationId === conversationId
      ? data.messages.filter((entry) => !listed.has(entry.id) && !listed.has(entry.value.id))
      : []

  return {
    ...data,
    activeConversationId: conversationId,
    messages: [...messages.map(confirmed), ...unlisted],
    failedSections: data.failedSections.filter((s) => s !== "messages"),
  }
}

export function withFailedSection(data: ChatData, section: ChatSection): ChatData {
  if (data.failedSections.includes(section)) return data

  return { ...data, failedSections: [...data.failedSections, section] }
}

/** Messages of a conversation the user already left are dropped. */
export function mergeChatTier(
  selection: ChatSelection,
): (data: ChatData, partial: PartialResult<ChatTiers>) => ChatData {
  return (data, partial) => {
    if (partial.kind === "error") return withFailedSection(data, partial.tier)

    switch (partial.tier) {
      case "conversations":
        return { ...data, conversations: partial.value }
      case "messages":
        if (partial.value.conversationId !== selection.conversationId) return data

        return showConversation(data, partial.value.conversationId, partial.value.messages)
      case "settings":
        return { ...data, settings: partial.value }
    }
  }
}

/**
 * Fold a pushed message into the screen. Messages for other conversations are
 * ignored; the echo of a local send replaces its tentative entry.
 */
export function appendIncoming(data: ChatData | null, message: ChatMessage): ChatData | null {
  if (data === null || message.conversationId !== data.activeConversationId) return data
  if (data.messages.some((entry) => entry.value.id === message.id)) return data

  const entry: OptimisticEntry<ChatMessage> = {
    state: "confirmed",
    id: message.clientId ?? message.id,
    value: message,
    confirmedAt: message.sentAt,
  }

  return { ...data, messages: upsertEntry(data.messages, entry) }
}

export function chatRealtime(api: ChatApi): RealtimeChannel<ChatData> {
  return {
    open: (push, signal) => api.subscribe((message) => push((data) => appendIncoming(data, message)), signal),
  }
}
