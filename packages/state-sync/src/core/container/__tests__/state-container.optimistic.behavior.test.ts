import type { OptimisticMutation } from "../../../ports/optimistic"
import type { RemoteCall } from "../../../ports/remote-call"
import { deferred } from "../../../tests/utils/deferred"
import { removeEntry, upsertEntry } from "../../optimistic/optimistic-entries"
import { directPlan } from "../../plans/direct-plan"
import { StateContainer } from "../state-container"
import { createHarness, type Harness, type Message, recordStates, type Thread } from "./harness"

class ThreadContainer extends StateContainer<Thread, Message> {
  /** Mimics a conversation switch: new data, pending sends forgotten. */
  switchThread(): void {
    this.discardPendingMutations()
    this.update(() => ({ messages: [] }))
  }
}

function sendHi(remoteCall: RemoteCall<Message>, id = "local_1"): OptimisticMutation<Thread, Message> {
  return {
    id,
    tentative: { id, text: "Hi" },
    remoteCall,
    place: (data, entry) => ({ messages: upsertEntry(data?.messages ?? [], entry) }),
    remove: (data, entryId) => ({ messages: removeEntry(data.messages, entryId) }),
    invalidates: ["chat:conversation:c1"],
  }
}

describe("StateContainer optimistic mutations", () => {
  let h: Harness
  let container: ThreadContainer

  beforeEach(async () => {
    h = createHarness()
    container = new ThreadContainer(h.core, {
      screenKey: "chat",
      plan: directPlan(async () => ({ messages: [] })),
    })
    await container.load()
  })

  afterEach(async () => {
    await container.dispose()
  })

  it("shows the tentative entry at once and replaces it when confirmed", async () => {
    const remote = deferred<Message>()
    const states = recordStates(container)
    h.core.cache.put("chat:conversation:c1", ["old"])

    const pending = container.sendOptimistic(sendHi(() => remote.promise))

    expect(container.getState().data?.messages).toEqual([
      { state: "tentative", id: "local_1", value: { id: "local_1", text: "Hi" }, submittedAt: 1_000 },
    ])

    h.clock.advance(200)
    remote.resolve({ id: "srv_9", text: "Hi" })

    await expect(pending).resolves.toEqual({ kind: "completed", source: "network" })
    expect(states).toHaveLength(2)
    expect(container.getState().data?.messages).toEqual([
      { state: "confirmed", id: "local_1", value: { id: "srv_9", text: "Hi" }, confirmedAt: 1_200 },
    ])
    expect(h.core.cache.get("chat:conversation:c1")).toBeUndefined()
  })

  it("rolls back to the prior data and raises one notice when the call fails", async () => {
    const before = container.getState().data
    const notices = vi.fn()
    container.onNotice(notices)

    const outcome = await container.sendOptimistic(
      sendHi(async () => {
        throw new Error("503")
      }),
    )

    expect(outcome).toMatchObject({ kind: "failed", error: { code: "network_failure" } })
    expect(container.getState().data).toEqual(before)
    expect(container.getState().error).toBeNull()
    expect(notices).toHaveBeenCalledTimes(1)
    expect(notices).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "mutation_failed", mutationId: "local_1" }),
    )
  })

  it("discards a confirmation that arrives after its entry was dropped", async () => {
    const remote = deferred<Message>()
    const pending = container.sendOptimistic(sendHi(() => remote.promise))

    container.switchThread()
    remote.resolve({ id: "srv_9", text: "Hi" })

    await expect(pending).resolves.toEqual({ kind: "abandoned" })
    expect(container.getState().data?.messages).toEqual([])
    expect(h.logger.at("debug", "confirmation discarded")[0]?.payload).toMatchObject({
      err: { code: "reconciliation_mismatch" },
    })
  })

  it("raises no notice for a dropped entry whose call fails", async () => {
    const remote = deferred<Message>()
    const notices = vi.fn()
    container.onNotice(notices)
    const pending = container.sendOptimistic(sendHi(() => remote.promise))

    container.switchThread()
    remote.reject(new Error("503"))

    await expect(pending).resolves.toEqual({ kind: "abandoned" })
    expect(notices).not.toHaveBeenCalled()
  })

  it("skips a second send with the same id while the first is in flight", async () => {
    const remote = deferred<Message>()
    const first = container.sendOptimistic(sendHi(() => remote.promise))

    await expect(container.sendOptimistic(sendHi(() => remote.promise))).resolves.toEqual({
      kind: "skipped",
      reason: "duplicate_operation",
    })

    remote.resolve({ id: "srv_9", text: "Hi" })
    await first
  })

  it("is routed through dispatch", async () => {
    const outcome = await container.dispatch({
      type: "send_optimistic",
      mutation: sendHi(async () => ({ id: "srv_1", text: "Hi" })),
    })

    expect(outcome).toEqual({ kind: "completed", source: "network" })
  })
})
