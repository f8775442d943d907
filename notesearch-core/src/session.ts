/**
 * Wires one search session: embedding engine, orchestrator (with its own
 * cache), mutation channel and analysis pipeline over a single note store.
 *
 * Nothing here is global; tests and hosts build as many isolated sessions
 * as they need.
 */

import type { Note } from './types/note';
import type { NoteStore } from './store/noteStore';
import { EmbeddingEngine } from './embedding/EmbeddingEngine';
import type { WordVectorLoader } from './embedding/EmbeddingEngine';
import type { WordVectorModel } from './embedding/wordVectors';
import { loadWordVectors } from './embedding/wordVectors';
import { SearchOrchestrator } from './search/SearchOrchestrator';
import type { SearchResult } from './search/SearchOrchestrator';
import { MutationChannel } from './store/MutationChannel';
import type { SyncStatus, WriterScheduler } from './store/MutationChannel';
import { AnalysisPipeline } from './analysis/AnalysisPipeline';
import type { BackgroundExecutor, ConfidenceGenerator } from './analysis/AnalysisPipeline';
import type { TermTagger } from './analysis/termTagger';
import type { SearchPolicy } from './policy';

export interface NoteSearchSessionOptions {
  store: NoteStore;
  /** Word-vector file loaded in the background. */
  vectorsPath?: string;
  /** Custom model source; takes precedence over `vectorsPath`. */
  loader?: WordVectorLoader;
  /** Model already in memory; no loading happens. */
  model?: WordVectorModel;
  policy?: Partial<SearchPolicy>;
  semanticMode?: boolean;
  tagger?: TermTagger;
  confidence?: ConfidenceGenerator;
  executor?: BackgroundExecutor;
  schedule?: WriterScheduler;
  onStatusChange?: (status: SyncStatus) => void;
  now?: () => number;
}

export interface NoteSearchSession {
  readonly engine: EmbeddingEngine;
  readonly orchestrator: SearchOrchestrator;
  readonly channel: MutationChannel;
  readonly pipeline: AnalysisPipeline;
  search(query: string): Note[];
  searchDetailed(query: string): SearchResult;
  findSimilar(note: Note): Note[];
  analyze(note: Note): void;
}

export function createNoteSearchSession(options: NoteSearchSessionOptions): NoteSearchSession {
  const { store, vectorsPath } = options;
  const loader = options.loader
    ?? (vectorsPath ? () => loadWordVectors(vectorsPath) : undefined);

  const engine = new EmbeddingEngine({ model: options.model, loader });
  engine.startLoading();

  const orchestrator = new SearchOrchestrator({
    engine,
    policy: options.policy,
    semanticMode: options.semanticMode,
    now: options.now,
  });
  const channel = new MutationChannel(store, {
    schedule: options.schedule,
    onStatusChange: options.onStatusChange,
  });
  const pipeline = new AnalysisPipeline({
    engine,
    channel,
    tagger: options.tagger,
    confidence: options.confidence,
    executor: options.executor,
    now: options.now,
  });

  return {
    engine,
    orchestrator,
    channel,
    pipeline,
    search: query => orchestrator.search(query, store.fetchAllNotes()),
    searchDetailed: query => orchestrator.searchDetailed(query, store.fetchAllNotes()),
    findSimilar: note => orchestrator.findSimilar(note, store.fetchAllNotes()),
    analyze: note => pipeline.analyze(note),
  };
}
