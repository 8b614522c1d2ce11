import type { Milliseconds } from "@screensync/clock"
import type { TierPriority } from "@screensync/state-sync"

export type DashboardStats = {
  lessonsPlanned: number
  questionsAnswered: number
  streakDays: number
}

export type ActivityItem = {
  id: string
  title: string
  occurredAt: Milliseconds
}

export type Analytics = {
  /** Sessions per day, oldest first. */
  weeklyUsage: number[]
  topSubject: string | null
}

export type Recommendation = {
  id: string
  title: string
  reason: string
}

export type Insight = {
  id: string
  summary: string
}

export type Achievement = {
  id: string
  name: string
  earnedAt: Milliseconds
}

/** What each dashboard section loads. */
export type DashboardSections = {
  stats: DashboardStats
  activities: ActivityItem[]
  analytics: Analytics
  recommendations: Recommendation[]
  insights: Insight[]
  achievements: Achievement[]
}

export type DashboardSection = keyof DashboardSections

export const sectionPriorities = {
  stats: "primary",
  activities: "primary",
  analytics: "secondary",
  recommendations: "secondary",
  insights: "tertiary",
  achievements: "tertiary",
} as const satisfies Record<DashboardSection, TierPriority>

export type DashboardData = {
  sections: Partial<DashboardSections>
  /** Sections whose last load failed. Their previous value, if any, is kept. */
  failedSections: readonly DashboardSection[]
}

export function emptyDashboard(): DashboardData {
  return { sections: {}, failedSections: [] }
}

export function isDashboardSection(value: string): value is DashboardSection {
  return Object.keys(sectionPriorities).some((section) => section === value)
}
