/**
 * Note store backed by a JSON file, for the CLI.
 *
 * File shape: `{ schemaVersion, notes: [...], lastSaved }` where dates are
 * ISO strings. A bare array of notes is accepted on read.
 *
 * @module store/JsonFileNoteStore
 */

import * as fs from 'fs';
import type { Note, NoteTask, SuggestedTag } from '../types/note';
import { createNote, parsePriority } from '../types/note';
import { InMemoryNoteStore } from './noteStore';
import { isRecord, writeJsonStore } from './jsonHelpers';
import { NoteStoreError, errorMessage } from '../errors';
import { log } from '../logger';

export const NOTE_STORE_SCHEMA_VERSION = 1;

interface SerializedNote {
  id: string;
  title: string;
  body: string;
  tags: string[];
  isFavorite: boolean;
  isArchived: boolean;
  isSystem: boolean;
  priority: string;
  progress: number;
  dueDate?: string;
  tasks: NoteTask[];
  contentEmbedding?: number[];
  suggestedTags: SuggestedTag[];
  lastAnalyzedAt?: string;
}

export interface NoteStoreFile {
  schemaVersion: number;
  notes: SerializedNote[];
  lastSaved: string;
}

function stringField(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : '';
}

function booleanField(raw: Record<string, unknown>, key: string): boolean {
  return raw[key] === true;
}

function dateField(raw: Record<string, unknown>, key: string): Date | undefined {
  const value = raw[key];
  if (typeof value !== 'string') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseTasks(value: unknown): NoteTask[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter(isRecord)
    .map(t => ({ text: stringField(t, 'text'), isCompleted: booleanField(t, 'isCompleted') }));
}

function parseSuggestedTags(value: unknown): SuggestedTag[] {
  if (!Array.isArray(value)) return [];
  const tags: SuggestedTag[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const { tag, confidence } = item;
    if (typeof tag === 'string' && typeof confidence === 'number') {
      tags.push({ tag, confidence });
    }
  }
  return tags;
}

function parseEmbedding(value: unknown): number[] | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const vector = value.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
  return vector.length === value.length ? vector : undefined;
}

/** Validates one serialized note; throws NoteStoreError when unusable. */
export function deserializeNote(raw: unknown, index: number, filePath?: string): Note {
  if (!isRecord(raw)) {
    throw new NoteStoreError(`Note at index ${index} is not an object`, filePath);
  }
  const { id, priority, progress } = raw;
  if (typeof id !== 'string' || id.length === 0) {
    throw new NoteStoreError(`Note at index ${index} has no id`, filePath);
  }

  return createNote({
    id,
    title: stringField(raw, 'title'),
    body: stringField(raw, 'body'),
    tags: stringArray(raw.tags),
    isFavorite: booleanField(raw, 'isFavorite'),
    isArchived: booleanField(raw, 'isArchived'),
    isSystem: booleanField(raw, 'isSystem'),
    priority: typeof priority === 'string' ? parsePriority(priority) ?? 'normal' : 'normal',
    progress: typeof progress === 'number' && Number.isFinite(progress)
      ? Math.min(1, Math.max(0, progress))
      : 0,
    dueDate: dateField(raw, 'dueDate'),
    tasks: parseTasks(raw.tasks),
    contentEmbedding: parseEmbedding(raw.contentEmbedding),
    suggestedTags: parseSuggestedTags(raw.suggestedTags),
    lastAnalyzedAt: dateField(raw, 'lastAnalyzedAt'),
  });
}

export function serializeNote(note: Note): SerializedNote {
  return {
    id: note.id,
    title: note.title,
    body: note.body,
    tags: note.tags,
    isFavorite: note.isFavorite,
    isArchived: note.isArchived,
    isSystem: note.isSystem,
    priority: note.priority,
    progress: note.progress,
    dueDate: note.dueDate?.toISOString(),
    tasks: note.tasks,
    contentEmbedding: note.contentEmbedding,
    suggestedTags: note.suggestedTags,
    lastAnalyzedAt: note.lastAnalyzedAt?.toISOString(),
  };
}

/** Parses file contents (already JSON-decoded) into notes. */
export function parseNoteStoreFile(data: unknown, filePath?: string): Note[] {
  const list = Array.isArray(data)
    ? data
    : isRecord(data) && Array.isArray(data.notes) ? data.notes : undefined;
  if (!list) {
    throw new NoteStoreError('Notes file must hold an array of notes or a { notes: [...] } object', filePath);
  }

  const notes = list.map((raw, i) => deserializeNote(raw, i, filePath));
  const seen = new Set<string>();
  for (const note of notes) {
    if (seen.has(note.id)) {
      throw new NoteStoreError(`Duplicate note id "${note.id}"`, filePath);
    }
    seen.add(note.id);
  }
  return notes;
}

export class JsonFileNoteStore extends InMemoryNoteStore {
  private constructor(readonly filePath: string, notes: Note[]) {
    super(notes);
  }

  static async open(filePath: string): Promise<JsonFileNoteStore> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new NoteStoreError(`Cannot read notes file ${filePath}: ${errorMessage(err)}`, filePath);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new NoteStoreError(`Notes file ${filePath} is not valid JSON: ${errorMessage(err)}`, filePath);
    }

    const notes = parseNoteStoreFile(data, filePath);
    log(`JsonFileNoteStore: loaded ${notes.length} notes from ${filePath}`);
    return new JsonFileNoteStore(filePath, notes);
  }

  async save(): Promise<void> {
    const file: NoteStoreFile = {
      schemaVersion: NOTE_STORE_SCHEMA_VERSION,
      notes: this.fetchAllNotes().map(serializeNote),
      lastSaved: new Date().toISOString(),
    };
    try {
      await writeJsonStore(this.filePath, file);
    } catch (err) {
      throw new NoteStoreError(`Failed to write ${this.filePath}: ${errorMessage(err)}`, this.filePath);
    }
    log(`JsonFileNoteStore: saved ${file.notes.length} notes`);
  }
}
