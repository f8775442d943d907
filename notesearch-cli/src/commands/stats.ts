/**
 * `notesearch stats <id>`: word counts, readability and key sentences for
 * one note.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  analyzeTextStatistics,
  calculateReadability,
  errorMessage,
  extractKeySentences,
  extractPlainText,
} from 'notesearch-core';
import { openCliSession, parseCount, readGlobalOptions, requireNote, writeJson } from '../cliSession';
import { displayTitle, formatReadingTime } from '../formatters';

export async function statsAction(id: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globalOpts = readGlobalOptions(cmd);

  try {
    const sentenceCount = parseCount(cmd.opts().sentences, 'sentences', 3);
    const { store } = await openCliSession(globalOpts);
    const note = requireNote(store, id);
    const text = extractPlainText(note);

    const stats = analyzeTextStatistics(text);
    const readability = calculateReadability(text);
    const keySentences = extractKeySentences(note.body, sentenceCount);

    if (globalOpts.json) {
      writeJson({ id, ...stats, readability, keySentences });
      return;
    }

    process.stdout.write(chalk.bold(displayTitle(note)) + '\n');
    process.stdout.write(chalk.dim('─'.repeat(40) + '\n'));
    process.stdout.write(`  ${chalk.dim('Words:')}         ${stats.wordCount}\n`);
    process.stdout.write(`  ${chalk.dim('Sentences:')}     ${stats.sentenceCount}\n`);
    process.stdout.write(`  ${chalk.dim('Paragraphs:')}    ${stats.paragraphCount}\n`);
    process.stdout.write(`  ${chalk.dim('Characters:')}    ${stats.characterCount}\n`);
    process.stdout.write(`  ${chalk.dim('Reading time:')}  ${formatReadingTime(stats.readingTimeMinutes)}\n`);
    process.stdout.write(
      `  ${chalk.dim('Readability:')}   ${readability.score.toFixed(1)} (${readability.level})\n`
    );

    if (keySentences.length > 0) {
      process.stdout.write('\n' + chalk.bold('Key sentences') + '\n');
      for (const sentence of keySentences) {
        process.stdout.write(`  - ${sentence}\n`);
      }
    }
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}
