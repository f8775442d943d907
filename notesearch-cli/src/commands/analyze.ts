/**
 * `notesearch analyze [--id <id>]`: suggest tags and refresh embeddings,
 * then save the notes file.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { NoteStoreError, errorMessage, isSearchable } from 'notesearch-core';
import { openCliSession, readGlobalOptions, requireNote, writeJson } from '../cliSession';
import { displayTitle, formatSyncStatus } from '../formatters';

export async function analyzeAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globalOpts = readGlobalOptions(cmd);
  const id: unknown = cmd.opts().id;

  try {
    const { store, session } = await openCliSession(globalOpts);
    const targets = typeof id === 'string'
      ? [requireNote(store, id)]
      : store.fetchAllNotes().filter(isSearchable);

    if (!session.engine.isLoaded) {
      process.stderr.write(chalk.yellow('No word vectors loaded; embeddings will be cleared\n'));
    }

    for (const note of targets) {
      session.analyze(note);
    }
    await session.pipeline.whenIdle();

    const status = session.channel.status;
    if (status.state === 'error') {
      throw new NoteStoreError(status.message, store.filePath);
    }

    if (globalOpts.json) {
      writeJson(targets.map(note => ({
        id: note.id,
        suggestedTags: note.suggestedTags,
        hasEmbedding: note.contentEmbedding !== undefined,
        lastAnalyzedAt: note.lastAnalyzedAt?.toISOString(),
      })));
      return;
    }

    for (const note of targets) {
      const tags = note.suggestedTags.length > 0
        ? note.suggestedTags.map(s => `${s.tag} ${chalk.dim(s.confidence.toFixed(2))}`).join(', ')
        : chalk.dim('no suggestions');
      const embedding = note.contentEmbedding ? chalk.green('embedded') : chalk.dim('no embedding');
      process.stdout.write(`${chalk.dim(note.id)} ${chalk.bold(displayTitle(note))}\n`);
      process.stdout.write(`  ${tags} ${chalk.dim('·')} ${embedding}\n`);
    }
    process.stdout.write(`\n${targets.length} analyzed, ${formatSyncStatus(status)}\n`);
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}
