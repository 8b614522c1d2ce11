import { nanoidIds, prefixedIds } from "@screensync/state-sync"
import type { ChatApi } from "../../domains/chat/api/chat.api"
import { MemoryChatApi } from "../../domains/chat/infra/chat-api.memory"
import type { DashboardApi } from "../../domains/dashboard/api/dashboard.api"
import { MemoryDashboardApi } from "../../domains/dashboard/infra/dashboard-api.memory"
import type { CoreServices } from "./core"
import { sampleChat, sampleDashboard } from "./sample-data"

export type RemoteApis = {
  dashboardApi: DashboardApi
  chatApi: ChatApi
}

/** In-process backends seeded with sample data. */
export function createDefaultRemoteApis(core: CoreServices): RemoteApis {
  const nowMs = core.clock.nowMs()

  const dashboardApi = new MemoryDashboardApi(
    { clock: core.clock },
    {
      sections: sampleDashboard(nowMs),
      latencyMs: { analytics: 150, recommendations: 150, insights: 400, achievements: 400 },
    },
  )

  const chatApi = new MemoryChatApi({ clock: core.clock, ids: prefixedIds("srv", nanoidIds()) }, sampleChat(nowMs))

  return { dashboardApi, chatApi }
}
