/**
 * Structured query language over free-text note search.
 *
 * Tokens are whitespace-separated and classified by the first grammar they
 * match:
 *
 * | Token                 | Effect                                   |
 * |-----------------------|------------------------------------------|
 * | `#tag`                | required tag (lowercased)                |
 * | `~term`               | semantic term                            |
 * | `is:fav`, `is:favorite` | favorites only                         |
 * | `has:task`, `has:tasks` | notes with at least one task           |
 * | `is:overdue`          | due date at or before now                |
 * | `priority:<level>`    | exact priority                           |
 * | `progress:>N`         | progress of at least N percent           |
 * | `due:yyyy-mm-dd`      | due on or before that date               |
 * | `tag:any`             | tag mode ANY instead of ALL              |
 * | anything else         | free-text term                           |
 *
 * The parser never throws. A token that carries a known prefix but invalid
 * content is dropped (and reported in `discarded`), not demoted to free text.
 *
 * @module query/queryParser
 */

import { parsePriority } from '../types/note';
import type { NotePriority } from '../types/note';

export type TagMatchMode = 'all' | 'any';

export interface FilterDescriptor {
  /** Lowercased tag names. */
  requiredTags: string[];
  tagMatchMode: TagMatchMode;
  requireFavorite: boolean;
  requireHasTask: boolean;
  requireOverdue: boolean;
  priority?: NotePriority;
  /** Fraction in [0, 1] (the query gives a percentage). */
  minProgress?: number;
  /** Local midnight of the requested date. */
  dueBefore?: Date;
  /** AND-combined substring terms, verbatim. */
  textTerms: string[];
  semanticTerms: string[];
}

export interface ParsedQuery {
  filter: FilterDescriptor;
  /** Operator tokens dropped for invalid content, in query order. */
  discarded: string[];
}

const PRIORITY_PREFIX = 'priority:';
const PROGRESS_PREFIX = 'progress:>';
const DUE_PREFIX = 'due:';

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function emptyFilter(): FilterDescriptor {
  return {
    requiredTags: [],
    tagMatchMode: 'all',
    requireFavorite: false,
    requireHasTask: false,
    requireOverdue: false,
    textTerms: [],
    semanticTerms: [],
  };
}

/** Splits a raw query into non-empty whitespace-separated tokens. */
export function tokenize(raw: string): string[] {
  return raw.split(/\s+/).filter(t => t.length > 0);
}

/**
 * Parses a calendar date in `yyyy-mm-dd` form to local midnight.
 * Rejects out-of-range months and days instead of rolling them over.
 */
export function parseCalendarDate(value: string): Date | undefined {
  const match = DATE_PATTERN.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

function parseNumber(value: string): number | undefined {
  if (!NUMBER_PATTERN.test(value)) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

export function parseQuery(raw: string): ParsedQuery {
  const filter = emptyFilter();
  const discarded: string[] = [];

  for (const token of tokenize(raw)) {
    const lower = token.toLowerCase();

    if (token.startsWith('#')) {
      const tag = token.slice(1);
      if (tag) filter.requiredTags.push(tag.toLowerCase());
      else discarded.push(token);
    } else if (token.startsWith('~')) {
      const term = token.slice(1);
      if (term) filter.semanticTerms.push(term);
      else discarded.push(token);
    } else if (lower === 'is:fav' || lower === 'is:favorite') {
      filter.requireFavorite = true;
    } else if (lower === 'has:task' || lower === 'has:tasks') {
      filter.requireHasTask = true;
    } else if (lower === 'is:overdue') {
      filter.requireOverdue = true;
    } else if (lower.startsWith(PRIORITY_PREFIX)) {
      const priority = parsePriority(token.slice(PRIORITY_PREFIX.length));
      if (priority) filter.priority = priority;
      else discarded.push(token);
    } else if (lower.startsWith(PROGRESS_PREFIX)) {
      const percent = parseNumber(token.slice(PROGRESS_PREFIX.length));
      if (percent !== undefined) filter.minProgress = percent / 100;
      else discarded.push(token);
    } else if (lower.startsWith(DUE_PREFIX)) {
      const date = parseCalendarDate(token.slice(DUE_PREFIX.length));
      if (date) filter.dueBefore = date;
      else discarded.push(token);
    } else if (lower === 'tag:any') {
      filter.tagMatchMode = 'any';
    } else {
      filter.textTerms.push(token);
    }
  }

  return { filter, discarded };
}

/** True when the filter narrows the note set at all; `tagMatchMode` alone doesn't. */
export function hasCriteria(filter: FilterDescriptor): boolean {
  return filter.requiredTags.length > 0
    || filter.requireFavorite
    || filter.requireHasTask
    || filter.requireOverdue
    || filter.priority !== undefined
    || filter.minProgress !== undefined
    || filter.dueBefore !== undefined
    || filter.textTerms.length > 0
    || filter.semanticTerms.length > 0;
}

/** True when the query asks for the semantic engine. */
export function hasSemanticTerms(filter: FilterDescriptor): boolean {
  return filter.semanticTerms.length > 0;
}
