/**
 * Turns global CLI options and the config file into an open note store and
 * a search session.
 */

import * as path from 'path';
import type { Command } from 'commander';
import {
  JsonFileNoteStore,
  NoteSearchError,
  createNoteSearchSession,
  expandHome,
  loadConfig,
  setVerbose,
} from 'notesearch-core';
import type { Note, NoteSearchConfig, NoteSearchSession } from 'notesearch-core';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  semantic: boolean;
  notes?: string;
  vectors?: string;
  config?: string;
}

export interface CliSession {
  config: NoteSearchConfig;
  store: JsonFileNoteStore;
  session: NoteSearchSession;
}

function optionalPath(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0
    ? path.resolve(expandHome(value))
    : undefined;
}

export function readGlobalOptions(cmd: Command): GlobalOptions {
  const raw = cmd.optsWithGlobals();
  return {
    json: raw.json === true,
    verbose: raw.verbose === true,
    semantic: raw.semantic === true,
    notes: optionalPath(raw.notes),
    vectors: optionalPath(raw.vectors),
    config: optionalPath(raw.config),
  };
}

/**
 * Loads config, opens the notes file and waits for the word vectors so a
 * one-shot command sees the model.
 */
export async function openCliSession(opts: GlobalOptions): Promise<CliSession> {
  setVerbose(opts.verbose);
  const config = await loadConfig(opts.config);

  const store = await JsonFileNoteStore.open(opts.notes ?? config.notesPath);
  const session = createNoteSearchSession({
    store,
    vectorsPath: opts.vectors ?? config.vectorsPath,
    policy: config.policy,
    semanticMode: opts.semantic || config.semanticMode,
  });
  await session.engine.whenLoaded();

  return { config, store, session };
}

export function requireNote(store: JsonFileNoteStore, id: string): Note {
  const note = store.fetchNote(id);
  if (!note) {
    throw new NoteSearchError(`No note with id "${id}"`);
  }
  return note;
}

/** Parses a positive integer option, or returns the fallback when absent. */
export function parseCount(value: unknown, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(n) || n < 1) {
    throw new NoteSearchError(`--${name} must be a positive integer`);
  }
  return n;
}

export function writeJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}
