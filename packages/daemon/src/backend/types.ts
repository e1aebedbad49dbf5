/**
 * TerminalBackend - platform interface for one PTY-backed process per session.
 *
 * Implementations never throw for expected failures: spawning reports
 * `false`, reads report `null` ("nothing right now", never EOF), and
 * `cleanup()` may be called any number of times.
 */

import type { BackendPlatform, TerminalSession } from "../gateway/session.js";

export interface TerminalSize {
  rows: number;
  cols: number;
}

export interface TerminalBackend {
  readonly platform: BackendPlatform;

  /** Spawn `session.command` under a new PTY and populate `session.backendHandle`. */
  startProcess(session: TerminalSession): boolean;

  /** Non-blocking read of at most `maxChars` UTF-16 code units; never splits a surrogate pair. */
  readOutput(session: TerminalSession, maxChars: number): string | null;

  writeInput(session: TerminalSession, data: string): boolean;

  resize(session: TerminalSession, rows: number, cols: number): boolean;

  /** Geometry as the PTY currently reports it. */
  getSize(session: TerminalSession): TerminalSize | null;

  /**
   * Resolve `true` once output is ready, `false` after `timeoutMs` or as soon
   * as the process has exited with nothing left to read.
   */
  poll(session: TerminalSession, timeoutMs: number): Promise<boolean>;

  isAlive(session: TerminalSession): boolean;

  /** Exit code of the process, or null while it runs or when unknown. */
  exitCode(session: TerminalSession): number | null;

  /** Terminate the process if needed and release the handle. Idempotent. */
  cleanup(session: TerminalSession): Promise<void>;
}
