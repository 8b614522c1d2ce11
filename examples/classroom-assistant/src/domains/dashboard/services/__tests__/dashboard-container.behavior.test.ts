import type { ScreenState } from "@screensync/state-sync"
import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import { flush } from "../../../../tests/utils/flush"
import type { DashboardData } from "../../model/dashboard.model"
import type { DashboardContainer } from "../dashboard-container"

describe("DashboardContainer", () => {
  let h: TestHarness
  let dashboard: DashboardContainer

  afterEach(async () => {
    await h.lifecycle.stop()
  })

  describe("progressive load", () => {
    beforeEach(async () => {
      h = await createTestHarness({
        dashboardLatencyMs: { analytics: 100, recommendations: 100, insights: 200, achievements: 200 },
      })
      dashboard = h.ctx.services.domains.dashboard.container
    })

    it("shows primary sections while secondary and tertiary ones are still loading", async () => {
      const pending = dashboard.load()
      await flush()

      expect(dashboard.getState().isLoading).toBe(true)
      expect(dashboard.getState().data?.sections.stats).toEqual({
        lessonsPlanned: 12,
        questionsAnswered: 48,
        streakDays: 5,
      })
      expect(dashboard.getState().data?.sections.activities).toHaveLength(2)
      expect(dashboard.getState().data?.sections.analytics).toBeUndefined()

      h.clock.advance(100)
      await flush()

      expect(dashboard.getState().data?.sections.analytics?.topSubject).toBe("Mathematics")
      expect(dashboard.getState().data?.sections.recommendations).toHaveLength(1)
      expect(dashboard.getState().data?.sections.insights).toBeUndefined()

      h.clock.advance(100)

      await expect(pending).resolves.toEqual({ kind: "completed", source: "network" })
      expect(dashboard.getState()).toMatchObject({ isLoading: false, error: null, lastUpdated: 200 })
      expect(dashboard.getState().data?.sections.achievements).toHaveLength(1)
      expect(dashboard.getState().data?.failedSections).toEqual([])
    })
  })

  describe("section reload during a progressive load", () => {
    beforeEach(async () => {
      h = await createTestHarness({ dashboardLatencyMs: { insights: 200, achievements: 200 } })
      dashboard = h.ctx.services.domains.dashboard.container
    })

    it("keeps the reloaded section when the remaining tiers land", async () => {
      const pending = dashboard.load()
      await flush()
      h.dashboardApi.setSection("stats", { lessonsPlanned: 13, questionsAnswered: 48, streakDays: 6 })

      await expect(dashboard.dispatch({ type: "select_item", id: "stats" })).resolves.toEqual({
        kind: "completed",
        source: "network",
      })

      h.clock.advance(200)
      await expect(pending).resolves.toEqual({ kind: "completed", source: "network" })

      expect(dashboard.getState().data?.sections.stats).toEqual({
        lessonsPlanned: 13,
        questionsAnswered: 48,
        streakDays: 6,
      })
      expect(dashboard.getState().data?.sections.achievements).toHaveLength(1)
      expect(h.ctx.services.core.sync.cache.get<DashboardData>("dashboard")?.value.sections.stats).toEqual({
        lessonsPlanned: 12,
        questionsAnswered: 48,
        streakDays: 5,
      })
    })
  })

  describe("with instant backends", () => {
    beforeEach(async () => {
      h = await createTestHarness()
      dashboard = h.ctx.services.domains.dashboard.container
    })

    it("keeps the other sections when one fails", async () => {
      h.dashboardApi.failSection("insights")

      await expect(dashboard.load()).resolves.toEqual({ kind: "completed", source: "network" })

      const data = dashboard.getState().data
      expect(data?.failedSections).toEqual(["insights"])
      expect(data?.sections.insights).toBeUndefined()
      expect(data?.sections.achievements).toHaveLength(1)
      expect(h.logger.at("warn", "tier failed")[0]?.payload).toMatchObject({ tier: "insights" })
    })

    it("fails the load only when every section fails", async () => {
      for (const section of ["stats", "activities", "analytics", "recommendations", "insights", "achievements"] as const) {
        h.dashboardApi.failSection(section)
      }

      const outcome = await dashboard.load()

      expect(outcome).toMatchObject({ kind: "failed", error: { code: "network_failure" } })
      expect(dashboard.getState().error?.code).toBe("network_failure")
      expect(dashboard.getState().isLoading).toBe(false)
    })

    it("serves a second load within the threshold from the cache", async () => {
      await dashboard.load()
      h.dashboardApi.calls.length = 0
      h.clock.advance(30_000)

      await expect(dashboard.load()).resolves.toEqual({ kind: "completed", source: "cache" })
      expect(h.dashboardApi.calls).toEqual([])
      expect(dashboard.getState().isFromCache).toBe(true)
    })

    it("reloads only the selected section", async () => {
      await dashboard.load()
      h.dashboardApi.calls.length = 0
      h.dashboardApi.setSection("stats", { lessonsPlanned: 13, questionsAnswered: 48, streakDays: 6 })

      const outcome = await dashboard.dispatch({ type: "select_item", id: "stats" })

      expect(outcome).toEqual({ kind: "completed", source: "network" })
      expect(h.dashboardApi.calls).toEqual(["stats"])
      expect(dashboard.getState().data?.sections.stats).toEqual({
        lessonsPlanned: 13,
        questionsAnswered: 48,
        streakDays: 6,
      })
      expect(h.ctx.services.core.sync.cache.get("dashboard:section:stats")?.value).toEqual({
        lessonsPlanned: 13,
        questionsAnswered: 48,
        streakDays: 6,
      })
    })

    it("marks a section failed and keeps its value when its reload fails", async () => {
      await dashboard.load()
      const before = dashboard.getState().data?.sections.analytics
      h.dashboardApi.failSection("analytics")

      const outcome = await dashboard.dispatch({ type: "select_item", id: "analytics" })

      expect(outcome).toMatchObject({ kind: "failed", error: { code: "network_failure" } })
      expect(dashboard.getState().data?.failedSections).toEqual(["analytics"])
      expect(dashboard.getState().data?.sections.analytics).toEqual(before)
    })

    it("skips selection of an unknown section", async () => {
      await expect(dashboard.dispatch({ type: "select_item", id: "weather" })).resolves.toEqual({
        kind: "skipped",
        reason: "unsupported",
      })
    })

    it("clear_cache drops the screen entry and every section entry", async () => {
      await dashboard.load()
      await dashboard.dispatch({ type: "select_item", id: "stats" })

      await dashboard.dispatch({ type: "clear_cache" })

      expect(h.ctx.services.core.sync.cache.get("dashboard")).toBeUndefined()
      expect(h.ctx.services.core.sync.cache.get("dashboard:section:stats")).toBeUndefined()
    })

    it("refreshes silently when resumed after the data went stale", async () => {
      await dashboard.load()
      h.clock.set(70_000)

      expect(dashboard.isStale()).toBe(true)
      expect(h.ctx.services.core.sync.cache.isStale("dashboard", 60_000)).toBe(true)

      const states: ScreenState<DashboardData>[] = []
      dashboard.subscribe((state) => states.push(state))

      await expect(dashboard.dispatch({ type: "resume" })).resolves.toEqual({
        kind: "completed",
        source: "network",
      })

      expect(states.length).toBeGreaterThan(0)
      expect(states.map((s) => s.isLoading)).not.toContain(true)
      expect(states.map((s) => s.isRefreshing)).not.toContain(true)
      expect(dashboard.getState().lastUpdated).toBe(70_000)
    })

    it("skips the refresh when resumed while the data is fresh", async () => {
      await dashboard.load()
      h.clock.advance(10_000)

      await expect(dashboard.dispatch({ type: "resume" })).resolves.toEqual({
        kind: "skipped",
        reason: "fresh",
      })
    })
  })
})
