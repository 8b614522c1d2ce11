import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./hook"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { domains } = context.services

  return [
    {
      name: "stop:chat",
      fn: () => domains.chat.closeAll(),
    },
    {
      name: "stop:dashboard",
      fn: () => domains.dashboard.container.dispose(),
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
