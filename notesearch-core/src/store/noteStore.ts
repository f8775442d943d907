/**
 * The note store as the engine sees it: read everything, read one, and
 * apply a mutation on the writer context.
 *
 * @module store/noteStore
 */

import type { Note } from '../types/note';

/** A change applied in place to one note on the writer context. */
export type NoteMutation = (note: Note) => void;

export interface NoteStore {
  fetchAllNotes(): Note[];
  fetchNote(id: string): Note | undefined;
  /** Returns false, without throwing, when no note has this id. */
  applyMutation(id: string, mutation: NoteMutation): boolean;
  /** Persist applied mutations. */
  save(): Promise<void>;
}

/** Keeps notes in insertion order. Saving is a no-op. */
export class InMemoryNoteStore implements NoteStore {
  protected readonly notes = new Map<string, Note>();

  constructor(notes: Iterable<Note> = []) {
    for (const note of notes) {
      this.notes.set(note.id, note);
    }
  }

  fetchAllNotes(): Note[] {
    return Array.from(this.notes.values());
  }

  fetchNote(id: string): Note | undefined {
    return this.notes.get(id);
  }

  applyMutation(id: string, mutation: NoteMutation): boolean {
    const note = this.notes.get(id);
    if (!note) return false;
    mutation(note);
    return true;
  }

  insert(note: Note): void {
    this.notes.set(note.id, note);
  }

  delete(id: string): boolean {
    return this.notes.delete(id);
  }

  async save(): Promise<void> {
    // nothing to persist
  }
}
