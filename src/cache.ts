/**
 * Keyed TTL cache with load-through. A rejected loader stores nothing, so
 * the next call retries; concurrent loads for one key share a promise.
 * `delete` also invalidates a load already in flight: its value reaches
 * the callers that were waiting on it but is never stored.
 */
export class TtlCache<T> {
  private entries = new Map<string, { value: T; expiresAt: number }>()
  private inFlight = new Map<string, Promise<T>>()
  private generations = new Map<string, number>()

  constructor(private readonly clock: () => number = Date.now) {}

  get(key: string, now = this.clock()) {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    if (entry.expiresAt <= now) {
      this.entries.delete(key)
      return undefined
    }
    return entry.value
  }

  set(key: string, value: T, ttlMs: number, now = this.clock()) {
    this.entries.set(key, { value, expiresAt: now + Math.max(0, ttlMs) })
    return value
  }

  delete(key: string) {
    this.entries.delete(key)
    this.inFlight.delete(key)
    this.generations.set(key, this.generation(key) + 1)
  }

  clear() {
    const keys = new Set([...this.entries.keys(), ...this.inFlight.keys()])
    for (const key of keys) this.delete(key)
  }

  private generation(key: string) {
    return this.generations.get(key) ?? 0
  }

  async getOrLoad(key: string, loader: () => Promise<T>, ttlMs: number) {
    const cached = this.get(key)
    if (cached !== undefined) return cached

    const existing = this.inFlight.get(key)
    if (existing) return existing

    const generation = this.generation(key)
    const promise = loader()
      .then((value) =>
        generation === this.generation(key)
          ? this.set(key, value, ttlMs)
          : value,
      )
      .finally(() => {
        if (this.inFlight.get(key) === promise) this.inFlight.delete(key)
      })
    this.inFlight.set(key, promise)
    return promise
  }
}
