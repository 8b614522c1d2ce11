import type { EntryMap } from "./entry-map"

/**
 * Least-recently-used ordering: `get` and `set` both count as use.
 */
export class LruEntryMap<V> implements EntryMap<V> {
  private readonly map = new Map<string, V>()

  get(key: string): V | undefined {
    const value = this.map.get(key)

    if (value === undefined) return undefined

    this.map.delete(key)
    this.map.set(key, value)

    return value
  }

  peek(key: string): V | undefined {
    return this.map.get(key)
  }

  set(key: string, value: V): void {
    this.map.delete(key)
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
