import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileNoteStore, deserializeNote, parseNoteStoreFile, NOTE_STORE_SCHEMA_VERSION } from './JsonFileNoteStore';
import { NoteStoreError } from '../errors';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'notesearch-store-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeNotes(data: unknown): string {
  const file = path.join(dir, 'notes.json');
  fs.writeFileSync(file, JSON.stringify(data));
  return file;
}

describe('deserializeNote', () => {
  it('fills defaults for missing fields', () => {
    const note = deserializeNote({ id: 'n1' }, 0);
    expect(note).toMatchObject({
      id: 'n1',
      title: '',
      body: '',
      tags: [],
      isFavorite: false,
      priority: 'normal',
      progress: 0,
      tasks: [],
      suggestedTags: [],
    });
    expect(note.dueDate).toBeUndefined();
    expect(note.contentEmbedding).toBeUndefined();
  });

  it('clamps progress and parses priority and dates', () => {
    const note = deserializeNote({
      id: 'n1',
      priority: 'HIGH',
      progress: 1.7,
      dueDate: '2024-06-30T00:00:00.000Z',
      lastAnalyzedAt: 'not a date',
    }, 0);
    expect(note.priority).toBe('high');
    expect(note.progress).toBe(1);
    expect(note.dueDate?.toISOString()).toBe('2024-06-30T00:00:00.000Z');
    expect(note.lastAnalyzedAt).toBeUndefined();
  });

  it('falls back to normal for an unknown priority', () => {
    expect(deserializeNote({ id: 'n1', priority: 'extreme' }, 0).priority).toBe('normal');
  });

  it('drops an embedding with non-numeric components', () => {
    expect(deserializeNote({ id: 'n1', contentEmbedding: [1, 'x'] }, 0).contentEmbedding).toBeUndefined();
    expect(deserializeNote({ id: 'n1', contentEmbedding: [1, 0.5] }, 0).contentEmbedding).toEqual([1, 0.5]);
  });

  it('keeps only well-formed tasks and suggested tags', () => {
    const note = deserializeNote({
      id: 'n1',
      tasks: [{ text: 'call', isCompleted: true }, 'junk'],
      suggestedTags: [{ tag: 'Paris', confidence: 0.8 }, { tag: 'Rome' }],
    }, 0);
    expect(note.tasks).toEqual([{ text: 'call', isCompleted: true }]);
    expect(note.suggestedTags).toEqual([{ tag: 'Paris', confidence: 0.8 }]);
  });

  it('rejects entries without an id', () => {
    expect(() => deserializeNote({ title: 'x' }, 3)).toThrow('Note at index 3 has no id');
    expect(() => deserializeNote('x', 0)).toThrow(NoteStoreError);
  });
});

describe('parseNoteStoreFile', () => {
  it('accepts a bare array or a notes object', () => {
    expect(parseNoteStoreFile([{ id: 'a' }]).map(n => n.id)).toEqual(['a']);
    expect(parseNoteStoreFile({ notes: [{ id: 'a' }, { id: 'b' }] }).map(n => n.id)).toEqual(['a', 'b']);
  });

  it('rejects other shapes', () => {
    expect(() => parseNoteStoreFile({ items: [] })).toThrow(NoteStoreError);
  });

  it('rejects duplicate ids', () => {
    expect(() => parseNoteStoreFile([{ id: 'a' }, { id: 'a' }])).toThrow('Duplicate note id "a"');
  });
});

describe('JsonFileNoteStore', () => {
  it('round-trips notes through save and open', async () => {
    const file = writeNotes([
      { id: 'a', title: 'Budget', tags: ['work'], dueDate: '2024-06-30T00:00:00.000Z' },
      { id: 'b', title: 'Groceries' },
    ]);

    const store = await JsonFileNoteStore.open(file);
    store.applyMutation('a', note => {
      note.contentEmbedding = [0.25, 0.75];
      note.suggestedTags = [{ tag: 'Finance', confidence: 0.9 }];
    });
    await store.save();

    const reopened = await JsonFileNoteStore.open(file);
    expect(reopened.fetchAllNotes().map(n => n.id)).toEqual(['a', 'b']);
    const a = reopened.fetchNote('a');
    expect(a?.contentEmbedding).toEqual([0.25, 0.75]);
    expect(a?.suggestedTags).toEqual([{ tag: 'Finance', confidence: 0.9 }]);
    expect(a?.dueDate?.toISOString()).toBe('2024-06-30T00:00:00.000Z');

    const written: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(written).toMatchObject({ schemaVersion: NOTE_STORE_SCHEMA_VERSION });
    expect(fs.readdirSync(dir)).toEqual(['notes.json']);
  });

  it('raises NoteStoreError for a missing file', async () => {
    await expect(JsonFileNoteStore.open(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(NoteStoreError);
  });

  it('raises NoteStoreError for invalid JSON', async () => {
    const file = path.join(dir, 'notes.json');
    fs.writeFileSync(file, '{ not json');
    await expect(JsonFileNoteStore.open(file)).rejects.toThrow(/is not valid JSON/);
  });

  it('wraps write failures in NoteStoreError', async () => {
    const file = writeNotes([{ id: 'a' }]);
    const store = await JsonFileNoteStore.open(file);
    fs.rmSync(dir, { recursive: true, force: true });
    fs.writeFileSync(dir, 'now a file');

    await expect(store.save()).rejects.toBeInstanceOf(NoteStoreError);
    fs.rmSync(dir, { force: true });
  });
});
