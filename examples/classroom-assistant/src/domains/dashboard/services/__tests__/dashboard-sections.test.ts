import { SyncError } from "@screensync/state-sync"
import { emptyDashboard, isDashboardSection } from "../../model/dashboard.model"
import { mergeSection, seedDashboard, withSection } from "../dashboard-sections"

describe("dashboard sections", () => {
  it("recognises section names", () => {
    expect(isDashboardSection("insights")).toBe(true)
    expect(isDashboardSection("weather")).toBe(false)
  })

  it("clears a section's failure when it loads again", () => {
    const failed = mergeSection(emptyDashboard(), {
      tier: "stats",
      kind: "error",
      error: SyncError.networkFailure("stats", new Error("down")),
    })
    expect(failed.failedSections).toEqual(["stats"])

    const loaded = mergeSection(failed, {
      tier: "stats",
      kind: "value",
      value: { lessonsPlanned: 1, questionsAnswered: 2, streakDays: 3 },
    })

    expect(loaded).toEqual({
      sections: { stats: { lessonsPlanned: 1, questionsAnswered: 2, streakDays: 3 } },
      failedSections: [],
    })
  })

  it("does not mutate the data it merges into", () => {
    const data = emptyDashboard()

    withSection(data, "insights", [{ id: "ins_1", summary: "Mondays are busy" }])

    expect(data.sections).toEqual({})
  })

  it("keeps visible sections when a refresh starts", () => {
    const current = withSection(
      { sections: {}, failedSections: ["insights"] },
      "achievements",
      [{ id: "ach_1", name: "First lesson", earnedAt: 0 }],
    )

    expect(seedDashboard(current)).toEqual({
      sections: { achievements: [{ id: "ach_1", name: "First lesson", earnedAt: 0 }] },
      failedSections: [],
    })
  })
})
