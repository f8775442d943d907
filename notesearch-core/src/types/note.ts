/**
 * Note record types as seen by the query engine.
 *
 * The note store owns these records; the engine reads them and only writes
 * the analysis fields (`suggestedTags`, `lastAnalyzedAt`, `contentEmbedding`)
 * through the mutation channel.
 */

export const NOTE_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export type NotePriority = typeof NOTE_PRIORITIES[number];

/** Averaged word vector; length equals the word-vector model's dimension. */
export type EmbeddingVector = number[];

export interface NoteTask {
  text: string;
  isCompleted: boolean;
}

export interface SuggestedTag {
  tag: string;
  /** Synthetic confidence in [0, 1]. */
  confidence: number;
}

export interface Note {
  id: string;
  title: string;
  body: string;
  tags: string[];
  isFavorite: boolean;
  isArchived: boolean;
  /** System notes (onboarding, widget scratch) never appear in results. */
  isSystem: boolean;
  priority: NotePriority;
  /** Completion in [0, 1]. */
  progress: number;
  dueDate?: Date;
  tasks: NoteTask[];
  contentEmbedding?: EmbeddingVector;
  suggestedTags: SuggestedTag[];
  lastAnalyzedAt?: Date;
}

/**
 * Parses a priority keyword (case-insensitive). Returns undefined for
 * anything that isn't one of {@link NOTE_PRIORITIES}.
 */
export function parsePriority(value: string): NotePriority | undefined {
  const lower = value.toLowerCase();
  return NOTE_PRIORITIES.find(p => p === lower);
}

/** Builds a note with defaults for every field not given. */
export function createNote(fields: Partial<Note> & Pick<Note, 'id'>): Note {
  return {
    title: '',
    body: '',
    tags: [],
    isFavorite: false,
    isArchived: false,
    isSystem: false,
    priority: 'normal',
    progress: 0,
    tasks: [],
    suggestedTags: [],
    ...fields,
  };
}

/** Archived and system notes are excluded from every search surface. */
export function isSearchable(note: Note): boolean {
  return !note.isArchived && !note.isSystem;
}
