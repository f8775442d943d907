/**
 * Background analysis of a note: suggested tags plus a fresh embedding.
 *
 * `analyze` returns immediately. The work runs on the background executor
 * against a snapshot of the note's text, and the result goes back to the
 * note only through the {@link MutationChannel}. If the note was deleted in
 * the meantime the write-back is dropped. Two analyses of the same note may
 * race; whichever reaches the channel last wins.
 *
 * @module analysis/AnalysisPipeline
 */

import type { EmbeddingVector, Note, SuggestedTag } from '../types/note';
import type { EmbeddingEngine } from '../embedding/EmbeddingEngine';
import type { MutationChannel } from '../store/MutationChannel';
import { HeuristicTagger } from './termTagger';
import type { TermTagger } from './termTagger';
import { extractPlainText } from './textInsight';
import { log, logError } from '../logger';

export const MAX_SUGGESTED_TAGS = 5;

/**
 * Produces a confidence for one suggested tag. No classifier score exists,
 * so the default draws from a fixed plausible range.
 */
export type ConfidenceGenerator = () => number;

export const randomConfidence: ConfidenceGenerator = () => 0.7 + Math.random() * 0.25;

/** Runs CPU-bound work off the caller's stack. */
export type BackgroundExecutor = <T>(task: () => T) => Promise<T>;

export const immediateExecutor: BackgroundExecutor = <T>(task: () => T) =>
  new Promise<T>((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(task());
      } catch (err) {
        reject(err);
      }
    });
  });

export interface AnalysisPipelineOptions {
  engine: EmbeddingEngine;
  channel: MutationChannel;
  tagger?: TermTagger;
  confidence?: ConfidenceGenerator;
  executor?: BackgroundExecutor;
  maxSuggestedTags?: number;
  /** Milliseconds clock for `lastAnalyzedAt`. */
  now?: () => number;
}

interface AnalysisResult {
  suggestedTags: SuggestedTag[];
  embedding: EmbeddingVector | undefined;
}

export class AnalysisPipeline {
  private readonly engine: EmbeddingEngine;
  private readonly channel: MutationChannel;
  private readonly tagger: TermTagger;
  private readonly confidence: ConfidenceGenerator;
  private readonly executor: BackgroundExecutor;
  private readonly maxSuggestedTags: number;
  private readonly now: () => number;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: AnalysisPipelineOptions) {
    this.engine = options.engine;
    this.channel = options.channel;
    this.tagger = options.tagger ?? new HeuristicTagger();
    this.confidence = options.confidence ?? randomConfidence;
    this.executor = options.executor ?? immediateExecutor;
    this.maxSuggestedTags = options.maxSuggestedTags ?? MAX_SUGGESTED_TAGS;
    this.now = options.now ?? Date.now;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Fire-and-forget. Results arrive later through the mutation channel. */
  analyze(note: Note): void {
    const noteId = note.id;
    const tagText = extractPlainText(note);
    const embeddingText = `${note.title} ${note.body}`;

    const job: Promise<void> = this.executor(() => this.compute(tagText, embeddingText))
      .then(result => {
        this.channel.submit(noteId, target => {
          const existing = new Set(target.tags.map(t => t.toLowerCase()));
          target.suggestedTags = result.suggestedTags.filter(s => !existing.has(s.tag.toLowerCase()));
          target.contentEmbedding = result.embedding;
          target.lastAnalyzedAt = new Date(this.now());
        });
      })
      .catch(err => {
        logError(`AnalysisPipeline: analysis of note ${noteId} failed`, err);
      })
      .finally(() => {
        this.inFlight.delete(job);
      });

    this.inFlight.add(job);
  }

  /** Resolves once every dispatched analysis has been written back. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
    await this.channel.flush();
  }

  private compute(tagText: string, embeddingText: string): AnalysisResult {
    const tags = this.tagger.extract(tagText, this.maxSuggestedTags);
    const suggestedTags = tags.map(tag => ({ tag, confidence: this.confidence() }));
    const embedding = this.engine.embed(embeddingText);
    log(`AnalysisPipeline: ${tags.length} tags, embedding ${embedding ? `dim=${embedding.length}` : 'absent'}`);
    return { suggestedTags, embedding };
  }
}
