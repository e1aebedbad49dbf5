/**
 * Simple logger utility with consistent prefix formatting.
 * Provides info, warn, error, and debug levels.
 */

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: unknown) => void;
  debug: (msg: string) => void;
  /** Derive a logger whose prefix is scoped further, e.g. `[PUMP:ab12cd34]`. */
  child: (scope: string) => Logger;
}

function debugEnabled(): boolean {
  return !!(process.env.DEBUG || process.env.PTYHUB_DEBUG);
}

/**
 * Create a logger with a consistent prefix.
 * @param prefix - The prefix to prepend to all log messages (e.g., "REGISTRY", "PUMP", "API")
 */
export const createLogger = (prefix: string): Logger => ({
  info: (msg: string) => console.log(`[${prefix}] ${msg}`),
  warn: (msg: string) => console.warn(`[${prefix}] ${msg}`),
  error: (msg: string, err?: unknown) => {
    const errMsg = err instanceof Error ? err.message : String(err ?? "");
    console.error(`[${prefix}] ${msg}${err ? `: ${errMsg}` : ""}`);
  },
  debug: (msg: string) => {
    if (debugEnabled()) {
      console.log(`[${prefix}:DEBUG] ${msg}`);
    }
  },
  child: (scope: string) => createLogger(`${prefix}:${scope}`),
});

/**
 * Log an error that was intentionally caught and suppressed.
 * Use this instead of empty catch blocks to provide debugging context.
 * @param context - Description of what operation failed
 * @param error - The error that was caught
 */
export const logSilentError = (context: string, error: unknown): void => {
  if (debugEnabled()) {
    const errMsg = error instanceof Error ? error.message : String(error);
    console.log(`[SILENT] ${context}: ${errMsg}`);
  }
};
