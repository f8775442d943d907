/**
 * Suggested-tag extraction.
 *
 * The default tagger counts two kinds of candidates:
 *   - name runs: two or more consecutive capitalized words ("New York")
 *   - keywords: any other word of four or more letters that isn't a stopword
 *
 * Words inside a name run aren't counted again as keywords. Candidates are
 * compared case-insensitively, ranked by frequency (first occurrence breaks
 * ties) and returned in capitalized form.
 *
 * @module analysis/termTagger
 */

import { defaultStopwords } from './stopwords';

export interface TermTagger {
  extract(text: string, limit: number): string[];
}

const SENTENCE_BREAK = /[.!?\n]+/;
const WORD = /[\p{L}\p{N}][\p{L}\p{N}'’-]*/gu;
const CAPITALIZED = /^\p{Lu}/u;
const HAS_LETTER = /\p{L}/u;

const MIN_KEYWORD_LENGTH = 4;
const MIN_NAME_LENGTH = 3;

/** "new york" → "New York". */
export function capitalizeWords(text: string): string {
  return text
    .split(' ')
    .map(word => {
      const [first = '', ...rest] = [...word];
      return first.toUpperCase() + rest.join('').toLowerCase();
    })
    .join(' ');
}

interface Candidate {
  display: string;
  count: number;
  order: number;
}

export class HeuristicTagger implements TermTagger {
  constructor(private readonly stopwords: ReadonlySet<string> = defaultStopwords()) {}

  extract(text: string, limit: number): string[] {
    const candidates = new Map<string, Candidate>();
    const add = (term: string): void => {
      const key = term.toLowerCase();
      const existing = candidates.get(key);
      if (existing) {
        existing.count++;
      } else {
        candidates.set(key, { display: capitalizeWords(key), count: 1, order: candidates.size });
      }
    };

    for (const sentence of text.split(SENTENCE_BREAK)) {
      const words = sentence.match(WORD) ?? [];
      let i = 0;
      while (i < words.length) {
        let end = i;
        while (end < words.length && CAPITALIZED.test(words[end])) end++;

        if (end - i >= 2) {
          const name = words.slice(i, end).join(' ');
          if (name.length >= MIN_NAME_LENGTH) add(name);
          i = end;
          continue;
        }

        const word = words[i].toLowerCase();
        if ([...word].length >= MIN_KEYWORD_LENGTH && HAS_LETTER.test(word) && !this.stopwords.has(word)) {
          add(word);
        }
        i++;
      }
    }

    return Array.from(candidates.values())
      .sort((a, b) => b.count - a.count || a.order - b.order)
      .slice(0, limit)
      .map(c => c.display);
  }
}
