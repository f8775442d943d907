/**
 * Public API for notesearch-core.
 */

export const VERSION = '0.1.0';

// Note types
export type { Note, NoteTask, NotePriority, SuggestedTag, EmbeddingVector } from './types/note';
export { NOTE_PRIORITIES, parsePriority, createNote, isSearchable } from './types/note';

// Errors
export { NoteSearchError, NoteStoreError, ConfigError, errorMessage } from './errors';

// Logging
export { log, logError, setLogSink, setVerbose, isVerbose } from './logger';
export type { LogSink } from './logger';

// Config & paths
export { getConfigDir, getConfigFilePath, getDefaultNotesPath } from './paths';
export { loadConfig, parseConfig, defaultConfig, expandHome } from './config';
export type { NoteSearchConfig } from './config';
export { DEFAULT_SEARCH_POLICY } from './policy';
export type { SearchPolicy } from './policy';

// Query language
export { parseQuery, tokenize, parseCalendarDate, emptyFilter, hasCriteria, hasSemanticTerms } from './query/queryParser';
export type { FilterDescriptor, ParsedQuery, TagMatchMode } from './query/queryParser';
export { matchesFilter, filterNotes, buildHaystack } from './query/predicate';

// Embeddings
export { EmbeddingEngine } from './embedding/EmbeddingEngine';
export type { EmbeddingEngineOptions, RankOptions, RankedNote, WordVectorLoader } from './embedding/EmbeddingEngine';
export { InMemoryWordVectors, parseWordVectors, loadWordVectors } from './embedding/wordVectors';
export type { WordVectorModel } from './embedding/wordVectors';

// Cache & search
export { QueryCache, DEFAULT_THROTTLE_WINDOW_MS, DEFAULT_MAX_CACHE_ENTRIES } from './cache/QueryCache';
export type { QueryCacheOptions } from './cache/QueryCache';
export { SearchOrchestrator } from './search/SearchOrchestrator';
export type { SearchOrchestratorOptions, SearchResult, SearchRoute, LexicalEvaluator } from './search/SearchOrchestrator';

// Store & single-writer channel
export { InMemoryNoteStore } from './store/noteStore';
export type { NoteStore, NoteMutation } from './store/noteStore';
export { JsonFileNoteStore, parseNoteStoreFile, serializeNote, deserializeNote, NOTE_STORE_SCHEMA_VERSION } from './store/JsonFileNoteStore';
export type { NoteStoreFile } from './store/JsonFileNoteStore';
export { MutationChannel } from './store/MutationChannel';
export type { SyncStatus, WriterScheduler, MutationChannelOptions } from './store/MutationChannel';

// Analysis
export { AnalysisPipeline, MAX_SUGGESTED_TAGS, randomConfidence, immediateExecutor } from './analysis/AnalysisPipeline';
export type { AnalysisPipelineOptions, BackgroundExecutor, ConfidenceGenerator } from './analysis/AnalysisPipeline';
export { HeuristicTagger, capitalizeWords } from './analysis/termTagger';
export type { TermTagger } from './analysis/termTagger';
export { defaultStopwords } from './analysis/stopwords';
export {
  extractPlainText,
  analyzeTextStatistics,
  calculateReadability,
  extractKeySentences,
  cleanupText,
  countSyllablesInWord,
} from './analysis/textInsight';
export type { TextStatistics, Readability, ReadabilityLevel } from './analysis/textInsight';

// Session wiring
export { createNoteSearchSession } from './session';
export type { NoteSearchSession, NoteSearchSessionOptions } from './session';
