import type { ScreenState } from "../../ports/screen-state"
import { initialScreenState, isStale, needsRefresh, phaseOf } from "../screen-state"

describe("screen state helpers", () => {
  const loaded: ScreenState<string[]> = {
    ...initialScreenState<string[]>(),
    data: ["a"],
    lastUpdated: 1_000,
  }

  it("starts in the initial phase with nothing loaded", () => {
    const state = initialScreenState<string[]>()

    expect(phaseOf(state)).toBe("initial")
    expect(isStale(state, 0, 60_000)).toBe(true)
  })

  it("is stale strictly after the threshold", () => {
    expect(isStale(loaded, 61_000, 60_000)).toBe(false)
    expect(isStale(loaded, 61_001, 60_000)).toBe(true)
  })

  it("needs no refresh while a fetch is already showing", () => {
    expect(needsRefresh({ ...loaded, isRefreshing: true }, 100_000, 60_000)).toBe(false)
    expect(needsRefresh({ ...loaded, isLoading: true }, 100_000, 60_000)).toBe(false)
    expect(needsRefresh(loaded, 100_000, 60_000)).toBe(true)
  })

  it("derives the phase from the flags", () => {
    expect(phaseOf(loaded)).toBe("loaded")
    expect(phaseOf({ ...loaded, isRefreshing: true })).toBe("refreshing")
    expect(phaseOf({ ...initialScreenState<string[]>(), isLoading: true })).toBe("loading")
  })
})
