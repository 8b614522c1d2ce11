import { phaseOf } from "@screensync/state-sync"
import { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"

/**
 * Start the app with its in-process backends and log every screen transition
 * until SIGINT or SIGTERM.
 */
export async function run(options: AppContextOptions = {}): Promise<AppContext> {
  const ctx = await createAppContext(options)
  const { core, domains } = ctx.services

  domains.dashboard.container.subscribe((state) => {
    core.logger.info("dashboard state", {
      screen: "dashboard",
      phase: phaseOf(state),
      sections: Object.keys(state.data?.sections ?? {}),
    })
  })

  for (const hook of ctx.createStartHooks(ctx)) {
    await hook.fn()
  }

  const chat = domains.chat.open("conv_1")
  chat.subscribe((state) => {
    core.logger.info("chat state", {
      screen: "chat",
      phase: phaseOf(state),
      messages: state.data?.messages.length ?? 0,
    })
  })
  chat.onNotice((notice) => core.logger.warn("chat notice", { screen: "chat", notice: notice.kind }))
  await chat.start()

  const shutdown = async (signal: NodeJS.Signals) => {
    core.logger.info("shutting down", { signal })

    for (const hook of ctx.createStopHooks(ctx)) {
      await hook.fn()
    }
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        core.logger.error("shutdown failed", { err })
        process.exitCode = 1
      })
    })
  }

  return ctx
}
