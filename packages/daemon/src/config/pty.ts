/**
 * PTY backend and session configuration.
 */

import { parsePositiveInt } from "./helpers.js";

/** Maximum number of concurrently hosted sessions */
export const MAX_SESSIONS = parsePositiveInt(process.env.PTYHUB_MAX_SESSIONS, 20);

/** Default terminal rows */
export const PTY_DEFAULT_ROWS = 24;

/** Default terminal columns */
export const PTY_DEFAULT_COLS = 80;

/** Value of TERM for spawned processes unless the caller overrides it */
export const PTY_TERM_NAME = "xterm-256color";

/** How long one output-pump poll waits for data (ms) */
export const PTY_POLL_TIMEOUT_MS = parsePositiveInt(process.env.PTYHUB_POLL_TIMEOUT_MS, 10);

/** Upper bound of one read, and of the pending queue before the PTY is paused */
export const PTY_READ_CHUNK_CHARS = parsePositiveInt(process.env.PTYHUB_READ_CHUNK_CHARS, 20 * 1024);

/** Delay between SIGTERM and SIGKILL when terminating a Unix process group (ms) */
export const PTY_TERMINATE_GRACE_MS = parsePositiveInt(process.env.PTYHUB_TERMINATE_GRACE_MS, 100);

/** Length of generated session ids */
export const SESSION_ID_LENGTH = 8;
