/**
 * Tunable search policy. These are product decisions, not engine constants,
 * and can be overridden from the config file.
 */

import { DEFAULT_MAX_CACHE_ENTRIES, DEFAULT_THROTTLE_WINDOW_MS } from './cache/QueryCache';

export interface SearchPolicy {
  /** `findSimilar` keeps notes scoring at or above this. */
  similarThreshold: number;
  /** Maximum notes returned by `findSimilar`. */
  similarLimit: number;
  /** Semantic search keeps notes scoring strictly above this. */
  semanticThreshold: number;
  /** Link suggestions keep notes scoring at or above this. */
  suggestionThreshold: number;
  throttleWindowMs: number;
  maxCacheEntries: number;
}

export const DEFAULT_SEARCH_POLICY: Readonly<SearchPolicy> = {
  similarThreshold: 0.6,
  similarLimit: 3,
  semanticThreshold: 0.3,
  suggestionThreshold: 0.5,
  throttleWindowMs: DEFAULT_THROTTLE_WINDOW_MS,
  maxCacheEntries: DEFAULT_MAX_CACHE_ENTRIES,
};
