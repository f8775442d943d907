import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { getConfigDir, getConfigFilePath, getDefaultNotesPath } from './paths';

const savedOverride = process.env.NOTESEARCH_CONFIG_DIR;

afterEach(() => {
  if (savedOverride === undefined) {
    delete process.env.NOTESEARCH_CONFIG_DIR;
  } else {
    process.env.NOTESEARCH_CONFIG_DIR = savedOverride;
  }
});

describe('getConfigDir', () => {
  it('ends with notesearch', () => {
    delete process.env.NOTESEARCH_CONFIG_DIR;
    expect(getConfigDir()).toMatch(/notesearch$/);
  });

  it('honors NOTESEARCH_CONFIG_DIR', () => {
    process.env.NOTESEARCH_CONFIG_DIR = '/tmp/ns-config';
    expect(getConfigDir()).toBe('/tmp/ns-config');
  });
});

describe('getConfigFilePath', () => {
  it('joins the filename onto the config directory', () => {
    process.env.NOTESEARCH_CONFIG_DIR = '/tmp/ns-config';
    expect(getConfigFilePath()).toBe(path.join('/tmp/ns-config', 'config.json'));
    expect(getDefaultNotesPath()).toBe(path.join('/tmp/ns-config', 'notes.json'));
  });
});
