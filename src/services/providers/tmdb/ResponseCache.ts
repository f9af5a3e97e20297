type CacheParams = Record<string, string | number | boolean | undefined>;

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

/**
 * In-memory TTL cache for TMDB responses.
 *
 * Keys are the endpoint plus its sorted query parameters. Credentials are
 * never part of a key: the client adds `api_key` after the lookup.
 * At `maxEntries`, expired entries are pruned and then the oldest evicted.
 */
export class ResponseCache {
  private store = new Map<string, CacheEntry>();

  constructor(
    private readonly defaultTtlSeconds: number = 3600,
    private readonly maxEntries: number = 1000
  ) {}

  static buildKey(endpoint: string, params: CacheParams = {}): string {
    const query = Object.keys(params)
      .sort()
      .flatMap(name => {
        const value = params[name];
        return value === undefined ? [] : [`${name}=${String(value)}`];
      })
      .join('&');
    return query ? `${endpoint}?${query}` : endpoint;
  }

  /** Cached value, or undefined if expired/missing */
  get(key: string): unknown {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: unknown, ttlSeconds: number = this.defaultTtlSeconds): void {
    if (ttlSeconds <= 0) {
      return;
    }
    this.store.delete(key);
    if (this.store.size >= this.maxEntries && this.prune() === 0) {
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        this.store.delete(oldest.value);
      }
    }
    this.store.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  /** Drop expired entries */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Number of entries (including possibly expired) */
  get size(): number {
    return this.store.size;
  }
}
