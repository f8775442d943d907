import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InMemoryWordVectors, parseWordVectors, loadWordVectors } from './wordVectors';

describe('InMemoryWordVectors', () => {
  it('takes its dimension from the first vector', () => {
    const model = new InMemoryWordVectors([['alpha', [1, 2, 3]], ['beta', [0, 0, 1]]]);
    expect(model.dimension).toBe(3);
    expect(model.size).toBe(2);
    expect(model.vectorFor('beta')).toEqual([0, 0, 1]);
    expect(model.vectorFor('gamma')).toBeUndefined();
  });

  it('throws when a vector has the wrong dimension', () => {
    expect(() => new InMemoryWordVectors([['alpha', [1, 2]], ['beta', [1]]])).toThrow(
      'Word vector for "beta" has 1 components, expected 2',
    );
  });

  it('has dimension 0 when empty', () => {
    expect(new InMemoryWordVectors([]).dimension).toBe(0);
  });
});

describe('parseWordVectors', () => {
  it('reads one word and its components per line', () => {
    const model = parseWordVectors('budget 0.5 -1\nmilk 0 1.25\n');
    expect(model.dimension).toBe(2);
    expect(model.vectorFor('budget')).toEqual([0.5, -1]);
    expect(model.vectorFor('milk')).toEqual([0, 1.25]);
  });

  it('skips a count and dimension header', () => {
    const model = parseWordVectors('2 3\nbudget 1 0 0\nmilk 0 1 0');
    expect(model.size).toBe(2);
    expect(model.dimension).toBe(3);
  });

  it('skips blank, malformed and mismatched lines', () => {
    const model = parseWordVectors('budget 1 0\n\nbad x y\nlonely\nshort 1\nmilk 0 1\n');
    expect(model.size).toBe(2);
    expect(model.vectorFor('bad')).toBeUndefined();
    expect(model.vectorFor('short')).toBeUndefined();
    expect(model.vectorFor('lonely')).toBeUndefined();
  });
});

describe('loadWordVectors', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'notesearch-vectors-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('streams a model file', async () => {
    const file = path.join(dir, 'vectors.txt');
    fs.writeFileSync(file, '3 2\r\nbudget 1 0\r\nmilk 0 1\r\nplan 1 1\r\n');

    const model = await loadWordVectors(file);
    expect(model.size).toBe(3);
    expect(model.vectorFor('plan')).toEqual([1, 1]);
  });

  it('rejects when the file does not exist', async () => {
    await expect(loadWordVectors(path.join(dir, 'missing.txt'))).rejects.toThrow();
  });
});
