import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { RemoteApis } from "../../../app/services/remote"
import { ChatContainer } from "../services/chat-container"

export type ChatServices = {
  /** A chat screen opened on `conversationId`. */
  open(conversationId: string): ChatContainer
  /** Dispose every screen `open()` returned. */
  closeAll(): Promise<void>
}

export function createChatServices(config: AppConfig, core: CoreServices, remote: RemoteApis): ChatServices {
  const screens = new Set<ChatContainer>()

  return {
    open(conversationId) {
      const container = new ChatContainer(core.sync, {
        api: remote.chatApi,
        ids: core.ids,
        conversationId,
        staleThresholdMs: config.cache.staleThresholdMs,
        backgroundRefreshMs: config.refresh.backgroundRefreshMs,
        debounceWindowMs: config.signals.debounceWindowMs,
      })
      screens.add(container)

      return container
    },

    async closeAll() {
      const open = [...screens]
      screens.clear()

      await Promise.all(open.map((screen) => screen.dispose()))
    },
  }
}
