// ── Types ────────────────────────────────────────────────────────────────────

export interface TtlCacheOptions {
  ttlMs: number;
  /** Clock in milliseconds. Defaults to `Date.now`. */
  now?: () => number;
}

export interface CacheLoadOptions {
  forceRefresh?: boolean;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

// ── Cache ────────────────────────────────────────────────────────────────────

/**
 * Keyed TTL cache with async loaders. Writes only ever replace an entry
 * with a fresher value for the same key, so concurrent readers need no lock.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /** Return the live value for `key`, or undefined if absent or expired. */
  peek(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) return undefined;
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /** Return the cached value or run `loader` and store its result. Loader errors are not cached. */
  async getOrLoad(
    key: string,
    loader: () => Promise<V>,
    options: CacheLoadOptions = {},
  ): Promise<V> {
    if (!options.forceRefresh) {
      const cached = this.peek(key);
      if (cached !== undefined) return cached;
    }

    const value = await loader();
    this.set(key, value);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }
}
