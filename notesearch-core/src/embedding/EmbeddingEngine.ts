/**
 * Averaged word-vector embeddings and cosine-similarity ranking.
 *
 * The engine owns its word-vector model. The model is loaded once, in the
 * background; until it arrives every `embed` call returns `undefined`
 * ("no embedding"), which callers treat as an ordinary empty result.
 *
 * Thresholds are passed in by callers (see `SearchPolicy`); the engine has
 * none of its own.
 *
 * @module embedding/EmbeddingEngine
 */

import type { EmbeddingVector, Note } from '../types/note';
import type { WordVectorModel } from './wordVectors';
import { log, logError } from '../logger';

/** Tokens this short are never looked up. */
const MIN_TOKEN_LENGTH = 3;

export type WordVectorLoader = () => Promise<WordVectorModel>;

export interface EmbeddingEngineOptions {
  /** A model that is already available. */
  model?: WordVectorModel;
  /** Called once by {@link EmbeddingEngine.startLoading}. */
  loader?: WordVectorLoader;
}

export interface RankOptions {
  threshold: number;
  /** Keep scores equal to the threshold too. Default: strictly above. */
  inclusive?: boolean;
  /** Skip the candidate with this id (the note being compared). */
  excludeId?: string;
}

export interface RankedNote {
  note: Note;
  score: number;
}

export class EmbeddingEngine {
  private model: WordVectorModel | undefined;
  private readonly loader: WordVectorLoader | undefined;
  private loading: Promise<void> | undefined;

  constructor(options: EmbeddingEngineOptions = {}) {
    this.model = options.model;
    this.loader = options.loader;
  }

  get isLoaded(): boolean {
    return this.model !== undefined;
  }

  get dimension(): number | undefined {
    return this.model?.dimension;
  }

  /**
   * Starts loading the model without waiting for it. Later calls are no-ops.
   * A failed load is logged and leaves the engine without a model.
   */
  startLoading(): void {
    if (this.model || this.loading || !this.loader) return;

    const startedAt = Date.now();
    this.loading = this.loader().then(
      model => {
        this.model = model;
        log(`EmbeddingEngine: model ready (${model.size} words, dim=${model.dimension}) in ${Date.now() - startedAt}ms`);
      },
      error => {
        logError('EmbeddingEngine: failed to load word vectors', error);
      },
    );
  }

  /** Resolves once any load attempt has settled; true if a model is available. */
  async whenLoaded(): Promise<boolean> {
    if (this.loading) await this.loading;
    return this.isLoaded;
  }

  /**
   * Averages the vectors of every word longer than two characters.
   * Undefined when the model isn't loaded or no word resolved.
   */
  embed(text: string): EmbeddingVector | undefined {
    const model = this.model;
    if (!model) return undefined;

    const words = text
      .toLowerCase()
      .split(/\s+/)
      .filter(w => [...w].length >= MIN_TOKEN_LENGTH);

    let sum: number[] | undefined;
    let count = 0;

    for (const word of words) {
      const vector = model.vectorFor(word);
      if (!vector) continue;
      if (!sum) {
        sum = [...vector];
      } else {
        for (let i = 0; i < vector.length; i++) {
          sum[i] += vector[i];
        }
      }
      count++;
    }

    if (!sum || count === 0) return undefined;
    return sum.map(v => v / count);
  }

  /**
   * Cosine similarity in [-1, 1]. Zero when either vector has no magnitude
   * or the dimensions differ.
   */
  similarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) return 0;

    let dot = 0;
    let magA = 0;
    let magB = 0;
    for (let i = 0; i < a.length; i++) {
      dot += a[i] * b[i];
      magA += a[i] * a[i];
      magB += b[i] * b[i];
    }

    if (magA === 0 || magB === 0) return 0;
    const score = dot / (Math.sqrt(magA) * Math.sqrt(magB));
    return Math.max(-1, Math.min(1, score));
  }

  /**
   * Scores every candidate with a stored embedding and returns those past the
   * threshold, best first. Equal scores keep their input order.
   */
  rank(queryVector: readonly number[], candidates: readonly Note[], options: RankOptions): RankedNote[] {
    const results: RankedNote[] = [];

    for (const note of candidates) {
      if (options.excludeId !== undefined && note.id === options.excludeId) continue;
      if (!note.contentEmbedding) continue;

      const score = this.similarity(queryVector, note.contentEmbedding);
      const passes = options.inclusive ? score >= options.threshold : score > options.threshold;
      if (passes) {
        results.push({ note, score });
      }
    }

    // Array.prototype.sort is stable, so ties stay in input order
    return results.sort((a, b) => b.score - a.score);
  }
}
