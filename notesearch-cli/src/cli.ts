#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION, errorMessage } from 'notesearch-core';

const program = new Command();

program
  .name('notesearch')
  .description('Search, relate and analyze notes from the command line')
  .version(VERSION)
  .option('--json', 'Output as JSON')
  .option('--notes <path>', 'Notes file (default: from config, else ~/.config/notesearch/notes.json)')
  .option('--vectors <path>', 'Word-vector file for semantic search')
  .option('--config <path>', 'Config file (default: ~/.config/notesearch/config.json)')
  .option('--semantic', 'Rank free text by meaning instead of matching it')
  .option('--verbose', 'Log diagnostics to stderr');

// Commands are lazy-loaded so `--help` doesn't pull in the engine
const searchCmd = new Command('search')
  .description('Find notes with the query language: #tag, ~meaning, is:fav, has:task, is:overdue, priority:, progress:>, due:, tag:any')
  .argument('<query>', 'Query text')
  .option('--limit <n>', 'Maximum notes to show (default: 50)')
  .action(async (query: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { searchAction } = await import('./commands/search');
    return searchAction(query, _opts, cmd);
  });
program.addCommand(searchCmd);

const similarCmd = new Command('similar')
  .description('List the notes closest in meaning to a note')
  .argument('<id>', 'Note id')
  .option('--links', 'Show every suggested link with its score')
  .action(async (id: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { similarAction } = await import('./commands/similar');
    return similarAction(id, _opts, cmd);
  });
program.addCommand(similarCmd);

const analyzeCmd = new Command('analyze')
  .description('Suggest tags and refresh embeddings, then save the notes file')
  .option('--id <id>', 'Analyze one note (default: every active note)')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { analyzeAction } = await import('./commands/analyze');
    return analyzeAction(_opts, cmd);
  });
program.addCommand(analyzeCmd);

const statsCmd = new Command('stats')
  .description('Word counts, readability and key sentences for a note')
  .argument('<id>', 'Note id')
  .option('--sentences <n>', 'Key sentences to show (default: 3)')
  .action(async (id: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { statsAction } = await import('./commands/stats');
    return statsAction(id, _opts, cmd);
  });
program.addCommand(statsCmd);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
});
