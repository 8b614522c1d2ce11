import type { Milliseconds } from "@screensync/clock"
import type { MemoryChatApiOptions } from "../../domains/chat/infra/chat-api.memory"
import type { DashboardSections } from "../../domains/dashboard/model/dashboard.model"

const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR

export function sampleDashboard(nowMs: Milliseconds): DashboardSections {
  return {
    stats: { lessonsPlanned: 12, questionsAnswered: 48, streakDays: 5 },
    activities: [
      { id: "act_1", title: "Planned fractions lesson", occurredAt: nowMs - 2 * HOUR },
      { id: "act_2", title: "Asked about photosynthesis", occurredAt: nowMs - DAY },
    ],
    analytics: { weeklyUsage: [3, 5, 2, 4, 6, 1, 0], topSubject: "Mathematics" },
    recommendations: [
      { id: "rec_1", title: "Try a group quiz", reason: "Quizzes raised engagement last week" },
    ],
    insights: [{ id: "ins_1", summary: "Most questions arrive on Monday mornings" }],
    achievements: [{ id: "ach_1", name: "Five-day streak", earnedAt: nowMs - HOUR }],
  }
}

export function sampleChat(nowMs: Milliseconds): MemoryChatApiOptions {
  return {
    conversations: [
      { id: "conv_1", title: "Lesson ideas", updatedAt: nowMs - HOUR },
      { id: "conv_2", title: "Grading help", updatedAt: nowMs - DAY },
    ],
    messages: [
      {
        id: "srv_m1",
        conversationId: "conv_1",
        text: "Suggest a warm-up for a fractions lesson",
        author: "user",
        sentAt: nowMs - HOUR,
      },
      {
        id: "srv_m2",
        conversationId: "conv_1",
        text: "Ask pupils to split a paper strip into equal parts.",
        author: "assistant",
        sentAt: nowMs - HOUR + 5_000,
      },
      {
        id: "srv_m3",
        conversationId: "conv_2",
        text: "How should I weight homework?",
        author: "user",
        sentAt: nowMs - DAY,
      },
    ],
    settings: { language: "en", responseStyle: "concise" },
  }
}
