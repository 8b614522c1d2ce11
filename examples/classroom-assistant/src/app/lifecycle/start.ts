import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./hook"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { core, domains } = context.services

  return [
    {
      name: "start:dashboard",
      fn: async () => {
        const outcome = await domains.dashboard.container.start()
        core.logger.info("dashboard started", { screen: "dashboard", outcome: outcome.kind })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
