// TTL-based cache for automatic expiration
// Holds finished runs for a while so callers can still inspect them

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private defaultTTL: number = 15 * 60 * 1000, // 15 minutes default
    private cleanupMs: number = 60 * 1000, // Cleanup every minute
    private now: () => number = Date.now,
  ) {
    this.startCleanup();
  }

  private startCleanup(): void {
    if (this.cleanupMs <= 0) return;
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupMs);
    // Expiry sweeps must not keep the process alive
    this.cleanupInterval.unref();
  }

  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  set(key: K, value: V, ttl?: number): void {
    const expiresAt = this.now() + (ttl ?? this.defaultTTL);
    this.cache.set(key, { value, expiresAt });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }

  values(): V[] {
    const now = this.now();
    const validValues: V[] = [];

    for (const entry of this.cache.values()) {
      if (entry.expiresAt > now) {
        validValues.push(entry.value);
      }
    }

    return validValues;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}
