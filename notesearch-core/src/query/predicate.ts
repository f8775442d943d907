/**
 * Evaluates a parsed {@link FilterDescriptor} against notes.
 *
 * Checks run in a fixed order and stop at the first failure:
 * archived/system → favorite → tasks → priority → progress → overdue →
 * due-before → tags → free text.
 *
 * @module query/predicate
 */

import type { Note } from '../types/note';
import type { FilterDescriptor } from './queryParser';

/**
 * Text searched by free-text terms: title, body, tags and task text joined
 * by single spaces, lowercased.
 */
export function buildHaystack(note: Note): string {
  const tagsJoined = note.tags.join(' ');
  const tasksJoined = note.tasks.map(t => t.text).join(' ');
  return [note.title, note.body, tagsJoined, tasksJoined].join(' ').toLowerCase();
}

function matchesTags(filter: FilterDescriptor, note: Note): boolean {
  if (filter.requiredTags.length === 0) return true;

  const lowered = new Set(note.tags.map(t => t.toLowerCase()));
  return filter.tagMatchMode === 'all'
    ? filter.requiredTags.every(tag => lowered.has(tag))
    : filter.requiredTags.some(tag => lowered.has(tag));
}

function matchesText(filter: FilterDescriptor, note: Note): boolean {
  if (filter.textTerms.length === 0) return true;

  const haystack = buildHaystack(note);
  return filter.textTerms.every(term => haystack.includes(term.toLowerCase()));
}

/**
 * Whether a note passes every check the filter asks for.
 *
 * @param now - Evaluation instant for `is:overdue`.
 */
export function matchesFilter(filter: FilterDescriptor, note: Note, now: Date): boolean {
  if (note.isArchived || note.isSystem) return false;
  if (filter.requireFavorite && !note.isFavorite) return false;
  if (filter.requireHasTask && note.tasks.length === 0) return false;
  if (filter.priority !== undefined && note.priority !== filter.priority) return false;
  if (filter.minProgress !== undefined && note.progress < filter.minProgress) return false;

  if (filter.requireOverdue) {
    if (!note.dueDate || note.dueDate.getTime() > now.getTime()) return false;
  }
  if (filter.dueBefore) {
    if (!note.dueDate || note.dueDate.getTime() > filter.dueBefore.getTime()) return false;
  }

  if (!matchesTags(filter, note)) return false;
  return matchesText(filter, note);
}

/** Notes passing the filter, in input order. */
export function filterNotes(filter: FilterDescriptor, notes: readonly Note[], now: Date): Note[] {
  return notes.filter(note => matchesFilter(filter, note, now));
}
