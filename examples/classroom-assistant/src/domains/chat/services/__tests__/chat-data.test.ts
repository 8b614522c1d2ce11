import { SyncError } from "@screensync/state-sync"
import { type ChatData, type ChatMessage, emptyChat } from "../../model/chat.model"
import { appendIncoming, mergeChatTier, seedChat, showConversation } from "../chat-data"

const message = (id: string, conversationId = "conv_1"): ChatMessage => ({
  id,
  conversationId,
  text: `text ${id}`,
  author: "assistant",
  sentAt: 10,
})

describe("chat data", () => {
  describe("mergeChatTier", () => {
    const merge = mergeChatTier({ conversationId: "conv_1" })

    it("records a failed tier once", () => {
      const error = SyncError.networkFailure("settings", new Error("down"))
      const once = merge(emptyChat("conv_1"), { tier: "settings", kind: "error", error })
      const twice = merge(once, { tier: "settings", kind: "error", error })

      expect(twice.failedSections).toEqual(["settings"])
    })

    it("replaces the conversation list", () => {
      const merged = merge(emptyChat("conv_1"), {
        tier: "conversations",
        kind: "value",
        value: [{ id: "conv_1", title: "Lesson ideas", updatedAt: 0 }],
      })

      expect(merged.conversations).toEqual([{ id: "conv_1", title: "Lesson ideas", updatedAt: 0 }])
    })

    it("drops messages of a conversation that is no longer selected", () => {
      const data = emptyChat("conv_1")

      const merged = merge(data, {
        tier: "messages",
        kind: "value",
        value: { conversationId: "conv_2", messages: [message("m1", "conv_2")] },
      })

      expect(merged).toBe(data)
    })
  })

  describe("showConversation", () => {
    it("keeps tentative entries of the same conversation after the server messages", () => {
      const data: ChatData = {
        ...emptyChat("conv_1"),
        messages: [
          { state: "confirmed", id: "m1", value: message("m1"), confirmedAt: 10 },
          { state: "tentative", id: "local_1", value: message("local_1"), submittedAt: 20 },
        ],
        failedSections: ["messages"],
      }

      const shown = showConversation(data, "conv_1", [message("m1"), message("m2")])

      expect(shown.messages.map((e) => e.id)).toEqual(["m1", "m2", "local_1"])
      expect(shown.failedSections).toEqual([])
    })

    it("keeps a pushed message the list does not cover yet", () => {
      const data: ChatData = {
        ...emptyChat("conv_1"),
        messages: [{ state: "confirmed", id: "m3", value: message("m3"), confirmedAt: 30 }],
      }

      const shown = showConversation(data, "conv_1", [message("m1")])

      expect(shown.messages.map((e) => e.id)).toEqual(["m1", "m3"])
    })

    it("replaces a confirmed send once the list carries it under its client id", () => {
      const data: ChatData = {
        ...emptyChat("conv_1"),
        messages: [{ state: "confirmed", id: "local_1", value: message("srv_1"), confirmedAt: 20 }],
      }

      const shown = showConversation(data, "conv_1", [{ ...message("srv_1"), clientId: "local_1" }])

      expect(shown.messages.map((e) => e.id)).toEqual(["srv_1"])
    })

    it("drops tentative entries when switching conversations", () => {
      const data: ChatData = {
        ...emptyChat("conv_1"),
        messages: [{ state: "tentative", id: "local_1", value: message("local_1"), submittedAt: 20 }],
      }

      const shown = showConversation(data, "conv_2", [])

      expect(shown).toMatchObject({ activeConversationId: "conv_2", messages: [] })
    })
  })

  describe("appendIncoming", () => {
    it("ignores pushes before the first load", () => {
      expect(appendIncoming(null, message("m1"))).toBeNull()
    })

    it("ignores a message it already shows", () => {
      const data: ChatData = {
        ...emptyChat("conv_1"),
        messages: [{ state: "confirmed", id: "local_1", value: message("m1"), confirmedAt: 10 }],
      }

      expect(appendIncoming(data, message("m1"))).toBe(data)
    })

    it("ignores messages of other conversations", () => {
      const data = emptyChat("conv_1")

      expect(appendIncoming(data, message("m1", "conv_2"))).toBe(data)
    })
  })

  it("seeds a refresh from the visible data with no failed sections", () => {
    const seed = seedChat({ conversationId: "conv_3" })
    const current: ChatData = { ...emptyChat("conv_1"), failedSections: ["settings"] }

    expect(seed(null)).toEqual(emptyChat("conv_3"))
    expect(seed(current)).toEqual({ ...current, failedSections: [] })
  })
})
