import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import { type Deferred, deferred } from "../../../../tests/utils/deferred"
import { flush } from "../../../../tests/utils/flush"
import type { ChatData, ChatMessage, ConversationMessages } from "../../model/chat.model"
import type { ChatContainer } from "../chat-container"

const texts = (chat: ChatContainer): string[] => chat.getState().data?.messages.map((e) => e.value.text) ?? []

describe("ChatContainer", () => {
  let h: TestHarness
  let chat: ChatContainer

  beforeEach(async () => {
    h = await createTestHarness()
    chat = h.ctx.services.domains.chat.open("conv_1")
  })

  afterEach(async () => {
    await h.lifecycle.stop()
  })

  it("loads conversations, the open conversation's messages and settings", async () => {
    await expect(chat.load()).resolves.toEqual({ kind: "completed", source: "network" })

    const data = chat.getState().data
    expect(data?.conversations.map((c) => c.id)).toEqual(["conv_1", "conv_2"])
    expect(data?.activeConversationId).toBe("conv_1")
    expect(data?.messages.map((e) => [e.state, e.value.id])).toEqual([
      ["confirmed", "srv_m1"],
      ["confirmed", "srv_m2"],
    ])
    expect(data?.settings).toEqual({ language: "en", responseStyle: "concise" })
  })

  describe("sendMessage", () => {
    beforeEach(async () => {
      await chat.load()
    })

    it("removes the message and raises one notice when the server rejects it", async () => {
      h.chatApi.rejectSendsWith(new Error("503 Service Unavailable"))
      const notices = vi.fn()
      chat.onNotice(notices)

      const pending = chat.sendMessage("Hi")

      expect(texts(chat)).toEqual([
        "Suggest a warm-up for a fractions lesson",
        "Ask pupils to split a paper strip into equal parts.",
        "Hi",
      ])

      const outcome = await pending

      expect(outcome).toMatchObject({ kind: "failed", error: { code: "network_failure" } })
      expect(texts(chat)).toEqual([
        "Suggest a warm-up for a fractions lesson",
        "Ask pupils to split a paper strip into equal parts.",
      ])
      expect(chat.getState().error).toBeNull()
      expect(notices).toHaveBeenCalledTimes(1)
      expect(notices).toHaveBeenCalledWith(
        expect.objectContaining({ kind: "mutation_failed", mutationId: "local_1" }),
      )
    })

    it("replaces the tentative message with the stored one and drops the cached conversation", async () => {
      await chat.dispatch({ type: "select_item", id: "conv_1" })
      expect(h.ctx.services.core.sync.cache.get("chat:conversation:conv_1")).toBeDefined()
      h.clock.advance(500)

      await expect(chat.sendMessage("Hi")).resolves.toEqual({ kind: "completed", source: "network" })

      expect(chat.getState().data?.messages.at(-1)).toEqual({
        state: "confirmed",
        id: "local_1",
        value: {
          id: "srv_1",
          conversationId: "conv_1",
          text: "Hi",
          author: "user",
          sentAt: 500,
          clientId: "local_1",
        },
        confirmedAt: 500,
      })
      expect(h.ctx.services.core.sync.cache.get("chat:conversation:conv_1")).toBeUndefined()
      expect(h.ctx.services.core.sync.cache.get("chat")).toBeUndefined()
    })

    it("forgets a send still in flight when the conversation changes", async () => {
      const remote = deferred<ChatMessage>()
      vi.spyOn(h.chatApi, "sendMessage").mockReturnValueOnce(remote.promise)

      const pending = chat.sendMessage("Hi")

      await expect(chat.dispatch({ type: "select_item", id: "conv_2" })).resolves.toEqual({
        kind: "completed",
        source: "network",
      })
      expect(chat.conversationId).toBe("conv_2")

      remote.resolve({
        id: "srv_5",
        conversationId: "conv_1",
        text: "Hi",
        author: "user",
        sentAt: 0,
        clientId: "local_1",
      })

      await expect(pending).resolves.toEqual({ kind: "abandoned" })
      expect(texts(chat)).toEqual(["How should I weight homework?"])
    })
  })

  describe("while a refresh waits for messages", () => {
    let stored: ConversationMessages
    let messages: Deferred<ConversationMessages>
    let refresh: Promise<unknown>

    beforeEach(async () => {
      await chat.start()
      stored = await h.chatApi.fetchMessages("conv_1", new AbortController().signal)
      messages = deferred<ConversationMessages>()
      vi.spyOn(h.chatApi, "fetchMessages").mockReturnValueOnce(messages.promise)

      refresh = chat.refresh()
      await flush()
    })

    it("keeps a rejected send off the screen and out of the cache", async () => {
      h.chatApi.rejectSendsWith(new Error("503 Service Unavailable"))

      await expect(chat.sendMessage("Hi")).resolves.toMatchObject({ kind: "failed" })

      messages.resolve(stored)
      await refresh

      expect(texts(chat)).toEqual([
        "Suggest a warm-up for a fractions lesson",
        "Ask pupils to split a paper strip into equal parts.",
      ])
      expect(
        h.ctx.services.core.sync.cache.get<ChatData>("chat")?.value.messages.map((e) => [e.state, e.value.text]),
      ).toEqual([
        ["confirmed", "Suggest a warm-up for a fractions lesson"],
        ["confirmed", "Ask pupils to split a paper strip into equal parts."],
      ])
    })

    it("keeps a message pushed before the list arrives", async () => {
      h.chatApi.deliver({
        id: "srv_99",
        conversationId: "conv_1",
        text: "Here is a rubric.",
        author: "assistant",
        sentAt: 0,
      })

      messages.resolve(stored)
      await refresh

      expect(texts(chat)).toEqual([
        "Suggest a warm-up for a fractions lesson",
        "Ask pupils to split a paper strip into equal parts.",
        "Here is a rubric.",
      ])
    })

    it("stays on a conversation selected before the list arrives", async () => {
      await expect(chat.dispatch({ type: "select_item", id: "conv_2" })).resolves.toEqual({
        kind: "completed",
        source: "network",
      })

      messages.resolve(stored)
      await refresh

      expect(chat.conversationId).toBe("conv_2")
      expect(chat.getState().data?.activeConversationId).toBe("conv_2")
      expect(texts(chat)).toEqual(["How should I weight homework?"])
    })
  })

  it("sends at most one typing signal per debounce window", async () => {
    await expect(chat.setTyping()).resolves.toEqual({ kind: "completed", source: "network" })

    h.clock.advance(500)
    await expect(chat.setTyping()).resolves.toEqual({ kind: "skipped", reason: "debounced" })

    h.clock.advance(600)
    await expect(chat.setTyping()).resolves.toEqual({ kind: "completed", source: "network" })

    expect(h.chatApi.typingSignals).toEqual(["conv_1", "conv_1"])
  })

  describe("realtime", () => {
    beforeEach(async () => {
      await chat.start()
    })

    it("appends messages pushed to the open conversation", () => {
      expect(chat.getState().isConnected).toBe(true)

      const reply: ChatMessage = {
        id: "srv_99",
        conversationId: "conv_1",
        text: "Here is a rubric.",
        author: "assistant",
        sentAt: 0,
      }
      h.chatApi.deliver(reply)
      h.chatApi.deliver({ ...reply, id: "srv_100", conversationId: "conv_2" })

      expect(chat.getState().data?.messages).toHaveLength(3)
      expect(chat.getState().data?.messages.at(-1)).toEqual({
        state: "confirmed",
        id: "srv_99",
        value: reply,
        confirmedAt: 0,
      })
    })

    it("lets the echo of a local send replace its tentative entry", async () => {
      const remote = deferred<ChatMessage>()
      vi.spyOn(h.chatApi, "sendMessage").mockReturnValueOnce(remote.promise)
      const stored: ChatMessage = {
        id: "srv_7",
        conversationId: "conv_1",
        text: "Hi",
        author: "user",
        sentAt: 0,
        clientId: "local_1",
      }

      const pending = chat.sendMessage("Hi")
      h.chatApi.deliver(stored)

      expect(chat.getState().data?.messages.filter((e) => e.id === "local_1")).toEqual([
        { state: "confirmed", id: "local_1", value: stored, confirmedAt: 0 },
      ])

      remote.resolve(stored)

      await expect(pending).resolves.toEqual({ kind: "completed", source: "network" })
      expect(texts(chat).filter((text) => text === "Hi")).toHaveLength(1)
    })

    it("unsubscribes when the screen is disposed", async () => {
      expect(h.chatApi.subscriberCount).toBe(1)

      await chat.dispose()

      expect(h.chatApi.subscriberCount).toBe(0)
    })
  })
})
