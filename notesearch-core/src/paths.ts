/**
 * Config path resolution.
 */

import * as os from 'os';
import * as path from 'path';

/**
 * Gets the notesearch config directory.
 * ~/.config/notesearch on Unix, %APPDATA%/notesearch on Windows.
 * NOTESEARCH_CONFIG_DIR overrides both.
 */
export function getConfigDir(): string {
  if (process.env.NOTESEARCH_CONFIG_DIR) {
    return process.env.NOTESEARCH_CONFIG_DIR;
  }
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'notesearch');
  }
  return path.join(os.homedir(), '.config', 'notesearch');
}

/**
 * Gets the path to a file in the config directory.
 * e.g., ~/.config/notesearch/config.json
 */
export function getConfigFilePath(filename = 'config.json'): string {
  return path.join(getConfigDir(), filename);
}

/** Default notes file: ~/.config/notesearch/notes.json */
export function getDefaultNotesPath(): string {
  return getConfigFilePath('notes.json');
}
