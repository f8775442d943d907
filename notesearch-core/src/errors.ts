/**
 * Error types raised by store adapters and configuration loading.
 *
 * The query engine itself never throws: malformed queries degrade, missing
 * embeddings are `undefined`, and write failures surface as a SyncStatus.
 */

export class NoteSearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoteSearchError';
  }
}

/** Reading or writing a note store failed, or its contents were malformed. */
export class NoteStoreError extends NoteSearchError {
  constructor(message: string, public readonly filePath?: string) {
    super(message);
    this.name = 'NoteStoreError';
  }
}

/** A configuration file held a value of the wrong type or range. */
export class ConfigError extends NoteSearchError {
  constructor(message: string, public readonly key: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Extracts a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
