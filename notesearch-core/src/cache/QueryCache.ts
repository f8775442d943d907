/**
 * Memoizes lexical result sets per raw query string.
 *
 * An entry is trusted for one throttle window after it was computed. When a
 * new key would push the cache past its cap, every entry is dropped first;
 * there is no LRU ordering.
 *
 * Keys are the raw query text: `"#work"` and `"#Work "` are different entries.
 *
 * @module cache/QueryCache
 */

export const DEFAULT_THROTTLE_WINDOW_MS = 500;
export const DEFAULT_MAX_CACHE_ENTRIES = 50;

export interface QueryCacheOptions {
  throttleWindowMs?: number;
  maxEntries?: number;
  /** Milliseconds clock; defaults to `Date.now`. */
  now?: () => number;
}

interface CacheEntry {
  noteIds: string[];
  computedAt: number;
}

export class QueryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly throttleWindowMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: QueryCacheOptions = {}) {
    this.throttleWindowMs = options.throttleWindowMs ?? DEFAULT_THROTTLE_WINDOW_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_CACHE_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached ids for `rawQuery` if still fresh, otherwise runs
   * `compute` and stores its result.
   */
  lookupOrCompute(rawQuery: string, compute: () => string[]): string[] {
    const now = this.now();
    const cached = this.entries.get(rawQuery);
    if (cached && now - cached.computedAt < this.throttleWindowMs) {
      return cached.noteIds;
    }

    const noteIds = compute();
    if (!this.entries.has(rawQuery) && this.entries.size >= this.maxEntries) {
      this.entries.clear();
    }
    this.entries.set(rawQuery, { noteIds, computedAt: now });
    return noteIds;
  }

  has(rawQuery: string): boolean {
    return this.entries.has(rawQuery);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
