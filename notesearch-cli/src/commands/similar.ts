/**
 * `notesearch similar <id>`: notes closest to one note by embedding.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { NoteSearchError, errorMessage } from 'notesearch-core';
import type { Note, NoteSearchSession } from 'notesearch-core';
import { openCliSession, readGlobalOptions, requireNote, writeJson } from '../cliSession';
import { displayTitle, formatNoteLine, noteSummary } from '../formatters';

/** Uses the stored embedding, or embeds the note on the fly when it has none. */
function withEmbedding(note: Note, session: NoteSearchSession): Note {
  if (note.contentEmbedding) return note;
  const vector = session.engine.embed(`${note.title} ${note.body}`);
  if (!vector) {
    throw new NoteSearchError(
      `Note "${note.id}" has no embedding; configure word vectors and run \`notesearch analyze\``
    );
  }
  return { ...note, contentEmbedding: vector };
}

export async function similarAction(id: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globalOpts = readGlobalOptions(cmd);
  const showLinks = cmd.opts().links === true;

  try {
    const { store, session } = await openCliSession(globalOpts);
    const note = withEmbedding(requireNote(store, id), session);
    const notes = store.fetchAllNotes();

    const ranked: Array<{ note: Note; score?: number }> = showLinks
      ? session.orchestrator.suggestLinks(note, notes)
      : session.orchestrator.findSimilar(note, notes).map(n => ({ note: n }));

    if (globalOpts.json) {
      writeJson({ id, notes: ranked.map(r => noteSummary(r.note, r.score)) });
      return;
    }

    if (ranked.length === 0) {
      process.stderr.write(chalk.dim(`No notes similar to "${displayTitle(note)}"\n`));
      return;
    }

    const heading = showLinks ? 'Suggested links for' : 'Similar to';
    process.stdout.write(chalk.bold(`${heading} "${displayTitle(note)}"`) + '\n\n');
    for (const r of ranked) {
      process.stdout.write(formatNoteLine(r.note, r.score) + '\n');
    }
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}
