export const CHAT_KEY = "chat"

export function chatConversationKey(conversationId: string): string {
  return `${CHAT_KEY}:conversation:${conversationId}`
}

export const TYPING_SIGNAL = "typing"
