import { type Logger, silentLogger } from '@/lib/logger';

interface CacheEntry<T> {
  data: T;
  expires: number;
}

export interface CacheOptions {
  enabled?: boolean;
  logger?: Logger;
  /** Clock in ms; replaceable in tests */
  now?: () => number;
}

/**
 * Simple in-memory cache with TTL, holding values of one type
 */
export class CacheService<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CacheOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get cached data or fetch new data.
   * A failed fetch is not cached and its error reaches the caller.
   *
   * @param key - Cache key
   * @param fetchFn - Producer called on a miss
   * @param ttlMinutes - Lifetime of the stored value
   */
  async getCachedData(key: string, fetchFn: () => Promise<T>, ttlMinutes: number = 60): Promise<T> {
    const now = this.now();
    const entry = this.entries.get(key);

    if (this.enabled && entry && entry.expires > now) {
      this.logger.debug(`Cache hit for ${key}`);
      return entry.data;
    }

    this.logger.debug(`Cache miss for ${key}, fetching fresh data`);
    const data = await fetchFn();

    if (this.enabled) {
      this.entries.set(key, { data, expires: now + ttlMinutes * 60 * 1000 });
    }

    return data;
  }

  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(key);
    }
  }

  /** Drop expired entries, returning how many were removed */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expires <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
