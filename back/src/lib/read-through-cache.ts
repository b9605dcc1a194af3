export interface CacheEntry<T> {
  value: T;
  refreshedAt: number;
}

export interface ReadThroughCacheOptions<T> {
  ttlMs: number;
  load: () => Promise<T>;
  now?: () => number;
}

/**
 * Holds one value loaded on demand and kept for `ttlMs`. Concurrent misses
 * share a single load; a failed load leaves the cache empty.
 */
export class ReadThroughCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inFlight: Promise<CacheEntry<T>> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: ReadThroughCacheOptions<T>) {
    this.now = options.now ?? Date.now;
  }

  async get(): Promise<CacheEntry<T>> {
    if (this.entry && this.isFresh(this.entry)) {
      return this.entry;
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.now() - entry.refreshedAt < this.options.ttlMs;
  }

  private async refresh(): Promise<CacheEntry<T>> {
    const value = await this.options.load();
    const entry = { value, refreshedAt: this.now() };
    this.entry = entry;
    return entry;
  }
}
