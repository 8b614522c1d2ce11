import type { EntryMap } from "./entry-map"

/**
 * Keeps first-insertion order. Reads and overwrites do not reorder.
 */
export class InsertionOrderEntryMap<V> implements EntryMap<V> {
  private readonly map = new Map<string, V>()

  get(key: string): V | undefined {
    return this.map.get(key)
  }

  peek(key: string): V | undefined {
    return this.map.get(key)
  }

  set(key: string, value: V): void {
    this.map.set(key, value)
  }

  delete(key: string): boolean {
    return this.map.delete(key)
  }

  has(key: string): boolean {
    return this.map.has(key)
  }

  keys(): string[] {
    return [...this.map.keys()]
  }

  clear(): void {
    this.map.clear()
  }

  size(): number {
    return this.map.size
  }

  victim(): string | undefined {
    for (const key of this.map.keys()) return key

    return undefined
  }
}
