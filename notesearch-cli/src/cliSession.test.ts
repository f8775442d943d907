import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';
import { NoteSearchError, isVerbose, setVerbose } from 'notesearch-core';
import { openCliSession, parseCount, readGlobalOptions, requireNote } from './cliSession';
import type { GlobalOptions } from './cliSession';

function makeProgram(onSearch: (cmd: Command) => void): Command {
  const program = new Command()
    .option('--json')
    .option('--notes <path>')
    .option('--vectors <path>')
    .option('--config <path>')
    .option('--semantic')
    .option('--verbose');
  program
    .command('search')
    .argument('<query>')
    .action((_query: string, _opts: Record<string, unknown>, cmd: Command) => onSearch(cmd));
  return program;
}

describe('readGlobalOptions', () => {
  it('reads options given before the subcommand', () => {
    let captured: GlobalOptions | undefined;
    makeProgram(cmd => { captured = readGlobalOptions(cmd); })
      .parse(['--json', '--notes', '/data/notes.json', 'search', 'budget'], { from: 'user' });

    expect(captured).toEqual({
      json: true,
      verbose: false,
      semantic: false,
      notes: path.resolve('/data/notes.json'),
      vectors: undefined,
      config: undefined,
    });
  });
});

describe('parseCount', () => {
  it('returns the fallback when absent', () => {
    expect(parseCount(undefined, 'limit', 50)).toBe(50);
  });

  it('parses a positive integer', () => {
    expect(parseCount('7', 'limit', 50)).toBe(7);
  });

  it('rejects anything else', () => {
    expect(() => parseCount('0', 'limit', 50)).toThrow('--limit must be a positive integer');
    expect(() => parseCount('2.5', 'limit', 50)).toThrow(NoteSearchError);
    expect(() => parseCount('many', 'limit', 50)).toThrow(NoteSearchError);
  });
});

describe('openCliSession', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'notesearch-cli-'));
  });

  afterEach(() => {
    setVerbose(false);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, data: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, typeof data === 'string' ? data : JSON.stringify(data));
    return file;
  }

  it('opens the notes file named in the config', async () => {
    const notesPath = write('notes.json', [{ id: 'a', title: 'Budget' }, { id: 'b', title: 'Groceries' }]);
    const vectorsPath = write('vectors.txt', 'budget 1 0\n');
    const config = write('config.json', { notesPath, vectorsPath, semanticMode: true, policy: { similarLimit: 2 } });

    const { session, config: loaded } = await openCliSession({ json: false, verbose: false, semantic: false, config });

    expect(loaded.policy.similarLimit).toBe(2);
    expect(session.engine.isLoaded).toBe(true);
    expect(session.orchestrator.semanticMode).toBe(true);
    expect(session.search('#missing').map(n => n.id)).toEqual([]);
  });

  it('lets flags override the config', async () => {
    const configured = write('configured.json', [{ id: 'a', title: 'Budget' }]);
    const flagged = write('flagged.json', [{ id: 'z', title: 'Budget' }]);
    const config = write('config.json', { notesPath: configured });

    const { session, store } = await openCliSession({
      json: false,
      verbose: true,
      semantic: true,
      notes: flagged,
      config,
    });

    expect(isVerbose()).toBe(true);
    expect(store.filePath).toBe(flagged);
    expect(session.orchestrator.semanticMode).toBe(true);
    expect(session.search('budget')).toEqual([]);
    expect(requireNote(store, 'z').title).toBe('Budget');
  });

  it('fails on a missing notes file', async () => {
    const config = write('config.json', { notesPath: path.join(dir, 'missing.json') });
    await expect(openCliSession({ json: false, verbose: false, semantic: false, config }))
      .rejects.toThrow(/Cannot read notes file/);
  });

  it('names the missing note', async () => {
    const notesPath = write('notes.json', []);
    const config = write('config.json', { notesPath });
    const { store } = await openCliSession({ json: false, verbose: false, semantic: false, config });
    expect(() => requireNote(store, 'nope')).toThrow('No note with id "nope"');
  });
});
