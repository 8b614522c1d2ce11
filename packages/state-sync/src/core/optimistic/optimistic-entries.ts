import type { OptimisticEntry } from "../../ports/optimistic"

/**
 * Replace the entry with the same id in place, or append it.
 */
export function upsertEntry<I>(
  entries: ReadonlyArray<OptimisticEntry<I>>,
  entry: OptimisticEntry<I>,
): OptimisticEntry<I>[] {
  const index = entries.findIndex((e) => e.id === entry.id)

  if (index === -1) return [...entries, entry]

  return entries.map((e, i) => (i === index ? entry : e))
}

export function removeEntry<I>(
  entries: ReadonlyArray<OptimisticEntry<I>>,
  id: string,
): OptimisticEntry<I>[] {
  return entries.filter((e) => e.id !== id)
}

export function isTentative<I>(
  entry: OptimisticEntry<I>,
): entry is Extract<OptimisticEntry<I>, { state: "tentative" }> {
  return entry.state === "tentative"
}
