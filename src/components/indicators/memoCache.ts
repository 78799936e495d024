export interface MemoCacheStats {
  hits: number
  misses: number
  size: number
}

/**
 * Compute-once cache. The first caller for a key runs the producer and every
 * later caller shares its result; entries are never replaced while they live.
 * The oldest entry is evicted once `maxEntries` is reached.
 */
export class MemoCache<T> {
  private readonly entries = new Map<string, { readonly value: T }>()
  private hits = 0
  private misses = 0

  constructor(private readonly maxEntries = 256) {}

  getOrCompute(key: string, produce: () => T): T {
    const cached = this.entries.get(key)
    if (cached) {
      this.hits += 1
      return cached.value
    }

    this.misses += 1
    const value = produce()

    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (!oldest.done) this.entries.delete(oldest.value)
    }
    this.entries.set(key, Object.freeze({ value }))
    return value
  }

  clear(): void {
    this.entries.clear()
  }

  stats(): MemoCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size }
  }
}
