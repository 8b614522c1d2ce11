import type { RealtimeSubscription } from "@screensync/state-sync"
import type {
  ChatMessage,
  ChatSettings,
  Conversation,
  ConversationMessages,
  MessageDraft,
} from "../model/chat.model"

export type IncomingMessageListener = (message: ChatMessage) => void

export interface ChatApi {
  listConversations(signal: AbortSignal): Promise<Conversation[]>
  fetchMessages(conversationId: string, signal: AbortSignal): Promise<ConversationMessages>
  fetchSettings(signal: AbortSignal): Promise<ChatSettings>

  /** Resolves with the stored message, carrying the server id. */
  sendMessage(draft: MessageDraft, signal: AbortSignal): Promise<ChatMessage>
  sendTyping(conversationId: string, signal: AbortSignal): Promise<void>

  /** Messages posted to any conversation by anyone but this client. */
  subscribe(listener: IncomingMessageListener, signal: AbortSignal): Promise<RealtimeSubscription>
}
