/**
 * User configuration, read from `config.json` in the config directory.
 *
 * ```json
 * {
 *   "notesPath": "~/notes/notes.json",
 *   "vectorsPath": "~/models/glove.6B.50d.txt",
 *   "semanticMode": false,
 *   "policy": { "semanticThreshold": 0.35 }
 * }
 * ```
 *
 * A missing file yields the defaults. Malformed JSON or a value of the
 * wrong type raises {@link ConfigError}.
 *
 * @module config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, errorMessage } from './errors';
import { DEFAULT_SEARCH_POLICY } from './policy';
import type { SearchPolicy } from './policy';
import { getConfigFilePath, getDefaultNotesPath } from './paths';
import { isRecord } from './store/jsonHelpers';
import { log } from './logger';

export interface NoteSearchConfig {
  notesPath: string;
  vectorsPath?: string;
  semanticMode: boolean;
  policy: SearchPolicy;
}

type PolicyKey = keyof SearchPolicy;

const THRESHOLD_KEYS: PolicyKey[] = ['similarThreshold', 'semanticThreshold', 'suggestionThreshold'];
const COUNT_KEYS: PolicyKey[] = ['similarLimit', 'maxCacheEntries'];

export function defaultConfig(): NoteSearchConfig {
  return {
    notesPath: getDefaultNotesPath(),
    semanticMode: false,
    policy: { ...DEFAULT_SEARCH_POLICY },
  };
}

/** Expands a leading `~` to the home directory. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function readPath(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`"${key}" must be a non-empty string`, key);
  }
  return expandHome(value);
}

function readPolicy(raw: unknown): SearchPolicy {
  const policy: SearchPolicy = { ...DEFAULT_SEARCH_POLICY };
  if (raw === undefined) return policy;
  if (!isRecord(raw)) {
    throw new ConfigError('"policy" must be an object', 'policy');
  }

  for (const key of THRESHOLD_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || value < -1 || value > 1) {
      throw new ConfigError(`"policy.${key}" must be a number between -1 and 1`, `policy.${key}`);
    }
    policy[key] = value;
  }

  for (const key of COUNT_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`"policy.${key}" must be a positive integer`, `policy.${key}`);
    }
    policy[key] = value;
  }

  const throttle = raw.throttleWindowMs;
  if (throttle !== undefined) {
    if (typeof throttle !== 'number' || throttle < 0) {
      throw new ConfigError('"policy.throttleWindowMs" must be a non-negative number', 'policy.throttleWindowMs');
    }
    policy.throttleWindowMs = throttle;
  }

  return policy;
}

/** Validates an already-parsed config object. */
export function parseConfig(raw: unknown): NoteSearchConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) {
    throw new ConfigError('config must be a JSON object', '');
  }

  const notesPath = readPath(raw, 'notesPath');
  if (notesPath) config.notesPath = notesPath;
  config.vectorsPath = readPath(raw, 'vectorsPath');

  const semanticMode = raw.semanticMode;
  if (semanticMode !== undefined) {
    if (typeof semanticMode !== 'boolean') {
      throw new ConfigError('"semanticMode" must be true or false', 'semanticMode');
    }
    config.semanticMode = semanticMode;
  }

  config.policy = readPolicy(raw.policy);
  return config;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function loadConfig(filePath = getConfigFilePath()): Promise<NoteSearchConfig> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      log(`config: no config at ${filePath}, using defaults`);
      return defaultConfig();
    }
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(err)}`, '');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config ${filePath} is not valid JSON: ${errorMessage(err)}`, '');
  }
  return parseConfig(raw);
}
