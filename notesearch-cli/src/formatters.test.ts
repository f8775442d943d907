import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { createNote } from 'notesearch-core';
import {
  displayTitle,
  formatDate,
  formatNoteLine,
  formatPercent,
  formatReadingTime,
  formatSyncStatus,
  noteSummary,
  truncate,
} from './formatters';

beforeAll(() => {
  chalk.level = 0;
});

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('cuts long text to the limit including the ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
  });
});

describe('formatDate', () => {
  it('uses the local calendar date', () => {
    expect(formatDate(new Date(2024, 0, 5, 23, 30))).toBe('2024-01-05');
  });
});

describe('formatPercent', () => {
  it('rounds to a whole percent', () => {
    expect(formatPercent(0.456)).toBe('46%');
    expect(formatPercent(1)).toBe('100%');
  });
});

describe('formatReadingTime', () => {
  it('shows short texts as under a minute', () => {
    expect(formatReadingTime(0.04)).toBe('< 1 min');
    expect(formatReadingTime(2.6)).toBe('3 min');
  });
});

describe('displayTitle', () => {
  it('prefers the title', () => {
    expect(displayTitle(createNote({ id: 'n', title: ' Plan ', body: 'x' }))).toBe('Plan');
  });

  it('falls back to the first non-blank body line', () => {
    expect(displayTitle(createNote({ id: 'n', body: '\n  \nfirst line\nsecond' }))).toBe('first line');
  });

  it('uses a placeholder for an empty note', () => {
    expect(displayTitle(createNote({ id: 'n' }))).toBe('(untitled)');
  });
});

describe('formatNoteLine', () => {
  it('shows id and title for a plain note', () => {
    expect(formatNoteLine(createNote({ id: 'n1', title: 'Groceries' }))).toBe('n1 Groceries');
  });

  it('adds score, favorite mark and metadata', () => {
    const note = createNote({
      id: 'n1',
      title: 'Launch',
      isFavorite: true,
      priority: 'high',
      tags: ['work', 'q3'],
      dueDate: new Date(2024, 5, 30),
      progress: 0.25,
    });
    expect(formatNoteLine(note, 0.8123)).toBe('0.81 n1 ★ Launch  high · #work #q3 · due 2024-06-30 · 25%');
  });
});

describe('noteSummary', () => {
  it('includes the score and a calendar due date', () => {
    const note = createNote({ id: 'n1', title: 'Launch', dueDate: new Date(2024, 5, 30) });
    expect(noteSummary(note, 0.5)).toEqual({
      id: 'n1',
      title: 'Launch',
      tags: [],
      priority: 'normal',
      progress: 0,
      isFavorite: false,
      dueDate: '2024-06-30',
      score: 0.5,
    });
  });
});

describe('formatSyncStatus', () => {
  it('describes each state', () => {
    expect(formatSyncStatus({ state: 'success' })).toBe('saved');
    expect(formatSyncStatus({ state: 'error', message: 'disk full' })).toBe('save failed: disk full');
  });
});
