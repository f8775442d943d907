/**
 * Terminal and JSON formatting for notes and analysis results.
 */

import chalk from 'chalk';
import type { Note, NotePriority, SyncStatus } from 'notesearch-core';

const PRIORITY_COLORS: Record<NotePriority, (s: string) => string> = {
  urgent: chalk.red.bold,
  high: chalk.yellow,
  normal: chalk.white,
  low: chalk.dim,
};

/** Truncate text to maxLength, appending "..." if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

/** Title, else the first non-blank body line, else a placeholder. */
export function displayTitle(note: Note): string {
  if (note.title.trim()) return note.title.trim();
  const firstLine = note.body.split('\n').find(line => line.trim().length > 0);
  return firstLine ? truncate(firstLine.trim(), 60) : '(untitled)';
}

export function formatReadingTime(minutes: number): string {
  if (minutes < 1) return '< 1 min';
  return `${Math.round(minutes)} min`;
}

/** One-line note summary: id, title, then priority, tags, due date and progress. */
export function formatNoteLine(note: Note, score?: number): string {
  const parts: string[] = [];
  if (score !== undefined) parts.push(chalk.cyan(score.toFixed(2)));
  parts.push(chalk.dim(note.id));
  if (note.isFavorite) parts.push(chalk.yellow('★'));
  parts.push(chalk.bold(displayTitle(note)));

  const meta: string[] = [];
  if (note.priority !== 'normal') meta.push(PRIORITY_COLORS[note.priority](note.priority));
  if (note.tags.length > 0) meta.push(chalk.dim(note.tags.map(t => `#${t}`).join(' ')));
  if (note.dueDate) meta.push(`due ${formatDate(note.dueDate)}`);
  if (note.progress > 0) meta.push(formatPercent(note.progress));

  const line = parts.join(' ');
  return meta.length > 0 ? `${line}  ${meta.join(chalk.dim(' · '))}` : line;
}

export interface NoteSummary {
  id: string;
  title: string;
  tags: string[];
  priority: NotePriority;
  progress: number;
  isFavorite: boolean;
  dueDate?: string;
  score?: number;
}

/** Plain object for `--json` output. */
export function noteSummary(note: Note, score?: number): NoteSummary {
  return {
    id: note.id,
    title: displayTitle(note),
    tags: note.tags,
    priority: note.priority,
    progress: note.progress,
    isFavorite: note.isFavorite,
    dueDate: note.dueDate ? formatDate(note.dueDate) : undefined,
    score,
  };
}

export function formatSyncStatus(status: SyncStatus): string {
  switch (status.state) {
    case 'idle': return chalk.dim('nothing to save');
    case 'syncing': return chalk.yellow('saving...');
    case 'success': return chalk.green('saved');
    case 'error': return chalk.red(`save failed: ${status.message}`);
  }
}
