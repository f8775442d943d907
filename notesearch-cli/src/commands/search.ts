/**
 * `notesearch search <query>`: run a query against the notes file.
 *
 * Lexical queries use the operator language (`#tag`, `is:fav`, `due:…`);
 * `~term` or `--semantic` rank by word-vector similarity instead.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'notesearch-core';
import { openCliSession, parseCount, readGlobalOptions, writeJson } from '../cliSession';
import { formatNoteLine, noteSummary } from '../formatters';

const DEFAULT_LIMIT = 50;

export async function searchAction(query: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globalOpts = readGlobalOptions(cmd);

  try {
    const limit = parseCount(cmd.opts().limit, 'limit', DEFAULT_LIMIT);
    const { session } = await openCliSession(globalOpts);
    const result = session.searchDetailed(query);
    const shown = result.notes.slice(0, limit);

    if (result.discarded.length > 0) {
      process.stderr.write(chalk.yellow(`Ignored: ${result.discarded.join(' ')}\n`));
    }

    if (globalOpts.json) {
      writeJson({
        query,
        route: result.route,
        discarded: result.discarded,
        total: result.notes.length,
        notes: shown.map(n => noteSummary(n, result.scores?.get(n.id))),
      });
      return;
    }

    if (shown.length === 0) {
      process.stderr.write(chalk.dim(`No notes match "${query}"\n`));
      return;
    }

    const countLabel = result.notes.length > shown.length
      ? `${shown.length} of ${result.notes.length} notes`
      : `${shown.length} note${shown.length === 1 ? '' : 's'}`;
    process.stdout.write(
      chalk.bold(`Results for "${query}"`) + chalk.dim(` (${countLabel}, ${result.route})`) + '\n\n'
    );
    for (const note of shown) {
      process.stdout.write(formatNoteLine(note, result.scores?.get(note.id)) + '\n');
    }
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}
