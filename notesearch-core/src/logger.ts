/**
 * Process-wide logger.
 *
 * `log` is diagnostic output and only written when verbose logging is on;
 * `logError` is always written. Output goes to a sink (stderr by default)
 * so hosts can redirect it.
 *
 * @module logger
 */

export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(line + '\n');
};

let sink: LogSink = stderrSink;
let verbose = false;

function timestamp(): string {
  return new Date().toISOString();
}

/** Redirect log output. Pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string): void {
  if (!verbose) return;
  sink(`[${timestamp()}] ${message}`);
}

export function logError(message: string, error?: unknown): void {
  const detail = error === undefined
    ? ''
    : `: ${error instanceof Error ? error.message : String(error)}`;
  sink(`[${timestamp()}] ERROR ${message}${detail}`);
}
