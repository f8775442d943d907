/**
 * Pretrained word-vector models.
 *
 * Models are read from the plain-text format shared by GloVe and fastText:
 * one word per line followed by its components, separated by spaces. A
 * fastText-style `<count> <dimension>` header line is skipped.
 *
 * @module embedding/wordVectors
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { log } from '../logger';

export interface WordVectorModel {
  readonly dimension: number;
  readonly size: number;
  vectorFor(word: string): readonly number[] | undefined;
}

export class InMemoryWordVectors implements WordVectorModel {
  private readonly vectors = new Map<string, number[]>();
  readonly dimension: number;

  constructor(entries: Iterable<readonly [string, number[]]>, dimension?: number) {
    let dim = dimension;
    for (const [word, vector] of entries) {
      if (dim === undefined) dim = vector.length;
      if (vector.length !== dim) {
        throw new Error(`Word vector for "${word}" has ${vector.length} components, expected ${dim}`);
      }
      this.vectors.set(word, vector);
    }
    this.dimension = dim ?? 0;
  }

  get size(): number {
    return this.vectors.size;
  }

  vectorFor(word: string): readonly number[] | undefined {
    return this.vectors.get(word);
  }
}

/** Incremental line parser; tracks the dimension set by the first vector. */
class VectorLineParser {
  readonly entries: Array<[string, number[]]> = [];
  dimension: number | undefined;
  skipped = 0;
  private lineNumber = 0;

  accept(rawLine: string): void {
    this.lineNumber++;
    const line = rawLine.trim();
    if (!line) return;

    const fields = line.split(/\s+/);
    if (this.lineNumber === 1 && fields.length === 2 && fields.every(f => /^\d+$/.test(f))) {
      return;
    }

    const [word, ...components] = fields;
    const vector = components.map(Number);
    if (vector.length === 0 || vector.some(v => !Number.isFinite(v))) {
      this.skipped++;
      return;
    }
    if (this.dimension === undefined) this.dimension = vector.length;
    if (vector.length !== this.dimension) {
      this.skipped++;
      return;
    }
    this.entries.push([word, vector]);
  }

  build(): InMemoryWordVectors {
    return new InMemoryWordVectors(this.entries, this.dimension);
  }
}

/**
 * Parses a whole model held in memory. Malformed lines and lines whose
 * dimension disagrees with the first vector are skipped.
 */
export function parseWordVectors(text: string): InMemoryWordVectors {
  const parser = new VectorLineParser();
  for (const line of text.split('\n')) {
    parser.accept(line);
  }
  return parser.build();
}

/** Streams a model file line by line. Rejects if the file can't be read. */
export async function loadWordVectors(filePath: string): Promise<InMemoryWordVectors> {
  await fs.promises.access(filePath, fs.constants.R_OK);

  const parser = new VectorLineParser();
  const stream = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      parser.accept(line);
    }
  } finally {
    rl.close();
    stream.destroy();
  }

  const model = parser.build();
  log(`wordVectors: loaded ${model.size} vectors (dim=${model.dimension}, skipped=${parser.skipped}) from ${filePath}`);
  return model;
}
