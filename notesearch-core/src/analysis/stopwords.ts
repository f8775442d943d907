/**
 * Stopwords ignored by tag extraction and key-sentence scoring: the
 * stopwords-iso English list plus words too generic for a notes app.
 */

import stopwordsIso from 'stopwords-iso';
import appStopwords from './stopwords.json';

let cached: ReadonlySet<string> | undefined;

export function defaultStopwords(): ReadonlySet<string> {
  if (!cached) {
    cached = new Set<string>([...(stopwordsIso.en ?? []), ...appStopwords]);
  }
  return cached;
}
