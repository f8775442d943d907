/**
 * Plain-text statistics, readability and key sentences for a note.
 *
 * @module analysis/textInsight
 */

import type { Note } from '../types/note';
import { defaultStopwords } from './stopwords';

const ATTACHMENT_MARKER = /\[\[ATTACH:[^\]]+\]\]/g;
const WORD = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;
const WORDS_PER_MINUTE = 200;

export interface TextStatistics {
  wordCount: number;
  sentenceCount: number;
  paragraphCount: number;
  /** Non-whitespace characters. */
  characterCount: number;
  readingTimeMinutes: number;
  averageWordsPerSentence: number;
}

export type ReadabilityLevel =
  | 'Very Easy'
  | 'Easy'
  | 'Fairly Easy'
  | 'Standard'
  | 'Fairly Difficult'
  | 'Difficult'
  | 'Very Difficult'
  | 'Not enough text';

export interface Readability {
  /** Flesch reading ease, clamped to [0, 100]. */
  score: number;
  level: ReadabilityLevel;
}

/** Title and body with inline attachment markers removed. */
export function extractPlainText(note: Note): string {
  const body = note.body.replace(ATTACHMENT_MARKER, '');
  return `${note.title}\n${body}`;
}

export function analyzeTextStatistics(text: string): TextStatistics {
  const wordCount = (text.match(WORD) ?? []).length;

  let sentenceCount = (text.match(/[.!?]/g) ?? []).length;
  if (sentenceCount === 0 && wordCount > 0) sentenceCount = 1;

  const paragraphCount = text.split('\n\n').filter(p => p.trim().length > 0).length;
  const characterCount = text.replace(/\s/g, '').length;

  return {
    wordCount,
    sentenceCount: Math.max(1, sentenceCount),
    paragraphCount: Math.max(1, paragraphCount),
    characterCount,
    readingTimeMinutes: wordCount / WORDS_PER_MINUTE,
    averageWordsPerSentence: sentenceCount > 0 ? wordCount / sentenceCount : wordCount,
  };
}

/** Vowel groups, less a trailing silent "e"; at least one. */
export function countSyllablesInWord(word: string): number {
  let count = 0;
  let lastWasVowel = false;
  for (const char of word) {
    const isVowel = 'aeiouy'.includes(char);
    if (isVowel && !lastWasVowel) count++;
    lastWasVowel = isVowel;
  }
  if (word.endsWith('e') && count > 1) count--;
  return Math.max(1, count);
}

function countSyllables(text: string): number {
  const words = text.toLowerCase().split(/\s+/).filter(w => w.length > 0);
  const total = words.reduce((sum, w) => sum + countSyllablesInWord(w), 0);
  return Math.max(1, total);
}

function readabilityLevel(score: number): ReadabilityLevel {
  if (score >= 90) return 'Very Easy';
  if (score >= 80) return 'Easy';
  if (score >= 70) return 'Fairly Easy';
  if (score >= 60) return 'Standard';
  if (score >= 50) return 'Fairly Difficult';
  if (score >= 30) return 'Difficult';
  return 'Very Difficult';
}

export function calculateReadability(text: string): Readability {
  const stats = analyzeTextStatistics(text);
  if (stats.wordCount === 0) {
    return { score: 0, level: 'Not enough text' };
  }

  const syllables = countSyllables(text);
  const flesch = 206.835
    - 1.015 * (stats.wordCount / stats.sentenceCount)
    - 84.6 * (syllables / stats.wordCount);
  const score = Math.max(0, Math.min(100, flesch));
  return { score, level: readabilityLevel(score) };
}

const EMPHASIS_WORDS = ['important', 'key', 'main', 'summary', 'conclusion'];

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(s => s.trim())
    .filter(s => s.length > 10);
}

/**
 * Highest-scoring sentences, best first. A sentence earns a point per
 * non-stopword longer than three characters, three for an emphasis word and
 * two for being first or last.
 */
export function extractKeySentences(
  text: string,
  count = 3,
  stopwords: ReadonlySet<string> = defaultStopwords(),
): string[] {
  const sentences = splitSentences(text);
  if (sentences.length === 0) return [];

  const first = sentences[0];
  const last = sentences[sentences.length - 1];

  const scored = sentences.map(sentence => {
    let score = 0;
    for (const word of sentence.toLowerCase().split(/\s+/)) {
      if (word.length > 3 && !stopwords.has(word)) score++;
    }
    if (EMPHASIS_WORDS.some(w => sentence.includes(w))) score += 3;
    if (sentence === first || sentence === last) score += 2;
    return { sentence, score };
  });

  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, count)
    .map(s => s.sentence);
}

/** Collapses runs of spaces and blank lines and fixes spacing before punctuation. */
export function cleanupText(text: string): string {
  return text
    .replace(/ {2,}/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/ +\n/g, '\n')
    .replace(/\n +/g, '\n')
    .replace(/ ,/g, ',')
    .replace(/ \./g, '.')
    .replace(/ !/g, '!')
    .replace(/ \?/g, '?')
    .trim();
}
