/**
 * Public search entry point.
 *
 * Each query takes exactly one route:
 *   - blank → every searchable note, in caller order
 *   - `~term` present, or semantic mode on → embedding rank (no cache)
 *   - otherwise → predicate filter behind the query cache
 *
 * Results from the two engines are never merged.
 *
 * @module search/SearchOrchestrator
 */

import type { Note } from '../types/note';
import { isSearchable } from '../types/note';
import { hasCriteria, hasSemanticTerms, parseQuery } from '../query/queryParser';
import type { FilterDescriptor } from '../query/queryParser';
import { filterNotes } from '../query/predicate';
import { QueryCache } from '../cache/QueryCache';
import type { EmbeddingEngine, RankedNote } from '../embedding/EmbeddingEngine';
import { DEFAULT_SEARCH_POLICY } from '../policy';
import type { SearchPolicy } from '../policy';
import { log } from '../logger';

export type SearchRoute = 'all' | 'lexical' | 'semantic';

export type LexicalEvaluator = (filter: FilterDescriptor, notes: readonly Note[], now: Date) => Note[];

export interface SearchOrchestratorOptions {
  engine: EmbeddingEngine;
  policy?: Partial<SearchPolicy>;
  semanticMode?: boolean;
  /** Milliseconds clock shared by the cache and `is:overdue`. */
  now?: () => number;
  /** Replaces the predicate filter on the lexical route. */
  evaluate?: LexicalEvaluator;
}

export interface SearchResult {
  route: SearchRoute;
  notes: Note[];
  /** Similarity by note id; semantic route only. */
  scores?: Map<string, number>;
  /** Operator tokens dropped by the parser. */
  discarded: string[];
}

export class SearchOrchestrator {
  readonly policy: Readonly<SearchPolicy>;
  semanticMode: boolean;

  private readonly engine: EmbeddingEngine;
  private readonly cache: QueryCache;
  private readonly now: () => number;
  private readonly evaluate: LexicalEvaluator;

  constructor(options: SearchOrchestratorOptions) {
    this.engine = options.engine;
    this.policy = { ...DEFAULT_SEARCH_POLICY, ...options.policy };
    this.semanticMode = options.semanticMode ?? false;
    this.now = options.now ?? Date.now;
    this.evaluate = options.evaluate ?? filterNotes;
    this.cache = new QueryCache({
      throttleWindowMs: this.policy.throttleWindowMs,
      maxEntries: this.policy.maxCacheEntries,
      now: this.now,
    });
  }

  search(query: string, notes: readonly Note[]): Note[] {
    return this.searchDetailed(query, notes).notes;
  }

  searchDetailed(query: string, notes: readonly Note[]): SearchResult {
    if (query.trim().length === 0) {
      return { route: 'all', notes: notes.filter(isSearchable), discarded: [] };
    }

    const { filter, discarded } = parseQuery(query);

    if (this.semanticMode || hasSemanticTerms(filter)) {
      const terms = hasSemanticTerms(filter) ? filter.semanticTerms : filter.textTerms;
      const semanticQuery = terms.join(' ');
      if (semanticQuery) {
        const ranked = this.semanticSearch(semanticQuery, notes);
        return {
          route: 'semantic',
          notes: ranked.map(r => r.note),
          scores: new Map(ranked.map(r => [r.note.id, r.score])),
          discarded,
        };
      }
    }

    // Only malformed operators (plus, at most, tag:any): no criterion left to match on
    if (discarded.length > 0 && !hasCriteria(filter)) {
      return { route: 'lexical', notes: [], discarded };
    }

    const ids = this.cache.lookupOrCompute(query, () => {
      const passed = this.evaluate(filter, notes, new Date(this.now()));
      return passed.map(n => n.id);
    });

    const byId = new Map(notes.map(n => [n.id, n]));
    const matched: Note[] = [];
    for (const id of ids) {
      const note = byId.get(id);
      if (note) matched.push(note);
    }
    return { route: 'lexical', notes: matched, discarded };
  }

  /** Ranks searchable notes against the embedding of `text`. */
  semanticSearch(text: string, notes: readonly Note[]): RankedNote[] {
    const queryVector = this.engine.embed(text);
    if (!queryVector) {
      log(`SearchOrchestrator: no embedding for "${text}"`);
      return [];
    }
    return this.engine
      .rank(queryVector, notes, { threshold: this.policy.semanticThreshold })
      .filter(r => isSearchable(r.note));
  }

  /** Up to `similarLimit` notes closest to `note`. */
  findSimilar(note: Note, notes: readonly Note[]): Note[] {
    return this.rankAgainst(note, notes, this.policy.similarThreshold)
      .slice(0, this.policy.similarLimit)
      .map(r => r.note);
  }

  /** Every note close enough to suggest as a link, with scores. */
  suggestLinks(note: Note, notes: readonly Note[]): RankedNote[] {
    return this.rankAgainst(note, notes, this.policy.suggestionThreshold);
  }

  /** Drop cached lexical results, e.g. after notes were created or edited. */
  invalidateCache(): void {
    this.cache.clear();
  }

  get cachedQueryCount(): number {
    return this.cache.size;
  }

  private rankAgainst(note: Note, notes: readonly Note[], threshold: number): RankedNote[] {
    if (!note.contentEmbedding) return [];
    return this.engine.rank(note.contentEmbedding, notes.filter(isSearchable), {
      threshold,
      inclusive: true,
      excludeId: note.id,
    });
  }
}
