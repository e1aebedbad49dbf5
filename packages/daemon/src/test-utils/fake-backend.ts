/**
 * FakeBackend - in-process TerminalBackend for registry, pump and protocol
 * tests. No processes are spawned.
 *
 * Built-in behaviour: `echo <args>` prints its arguments and exits 0,
 * `false` exits 1, anything else echoes written input back as output (like
 * a tty in cooked mode) until `exit()` is called.
 */

import type { TerminalBackend, TerminalSize } from "../backend/types.js";
import type { TerminalSession } from "../gateway/session.js";

export class FakeProcess {
  pending: string[] = [];
  readonly inputs: string[] = [];
  exited = false;
  exitCode: number | null = null;
  rows: number;
  cols: number;
  waiter: (() => void) | null = null;

  constructor(
    readonly session: TerminalSession,
    readonly pid: number
  ) {
    this.rows = session.rows;
    this.cols = session.cols;
  }

  /** Queue output as if the process had written it. */
  emit(data: string): void {
    this.pending.push(data);
    this.wake();
  }

  /** Mark the process as exited. */
  exit(code: number | null): void {
    if (this.exited) return;
    this.exited = true;
    this.exitCode = code;
    this.session.exitCode = code;
    this.wake();
  }

  wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

export interface FakeBackendOptions {
  /** Commands whose start fails */
  failCommands?: string[];
  /** Runs right after a process starts, before startProcess returns */
  onStart?: (proc: FakeProcess) => void;
}

export class FakeBackend implements TerminalBackend {
  readonly platform = "unix" as const;
  readonly processes = new Map<string, FakeProcess>();
  /** Ordered log of lifecycle calls, e.g. "start:<id>", "cleanup:<id>" */
  readonly calls: string[] = [];
  private nextPid = 1000;

  constructor(private readonly options: FakeBackendOptions = {}) {}

  startProcess(session: TerminalSession): boolean {
    this.calls.push(`start:${session.sessionId}`);
    if (this.options.failCommands?.includes(session.command)) {
      return false;
    }

    const proc = new FakeProcess(session, this.nextPid++);
    this.processes.set(session.sessionId, proc);
    session.backendHandle = { pid: proc.pid, platform: this.platform };

    if (session.command === "echo") {
      proc.emit(`${session.args.join(" ")}\r\n`);
      proc.exit(0);
    } else if (session.command === "false") {
      proc.exit(1);
    }
    this.options.onStart?.(proc);
    return true;
  }

  readOutput(session: TerminalSession, maxChars: number): string | null {
    const proc = this.processes.get(session.sessionId);
    if (!proc || proc.pending.length === 0) return null;

    const joined = proc.pending.join("");
    const output = joined.slice(0, maxChars);
    const rest = joined.slice(maxChars);
    proc.pending = rest ? [rest] : [];
    return output;
  }

  writeInput(session: TerminalSession, data: string): boolean {
    const proc = this.processes.get(session.sessionId);
    if (!proc || proc.exited) return false;
    proc.inputs.push(data);
    proc.emit(data);
    return true;
  }

  resize(session: TerminalSession, rows: number, cols: number): boolean {
    const proc = this.processes.get(session.sessionId);
    if (!proc || proc.exited) return false;
    proc.rows = rows;
    proc.cols = cols;
    session.rows = rows;
    session.cols = cols;
    return true;
  }

  getSize(session: TerminalSession): TerminalSize | null {
    const proc = this.processes.get(session.sessionId);
    return proc ? { rows: proc.rows, cols: proc.cols } : null;
  }

  poll(session: TerminalSession, timeoutMs: number): Promise<boolean> {
    const proc = this.processes.get(session.sessionId);
    if (!proc) return Promise.resolve(false);
    if (proc.pending.length > 0) return Promise.resolve(true);
    if (proc.exited) return Promise.resolve(false);

    proc.wake();
    return new Promise<boolean>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        if (proc.waiter === finish) proc.waiter = null;
        resolve(proc.pending.length > 0);
      };
      const timer = setTimeout(finish, timeoutMs);
      proc.waiter = finish;
    });
  }

  isAlive(session: TerminalSession): boolean {
    const proc = this.processes.get(session.sessionId);
    return !!proc && !proc.exited;
  }

  exitCode(session: TerminalSession): number | null {
    return this.processes.get(session.sessionId)?.exitCode ?? null;
  }

  async cleanup(session: TerminalSession): Promise<void> {
    this.calls.push(`cleanup:${session.sessionId}`);
    const proc = this.processes.get(session.sessionId);
    if (!proc) return;
    this.processes.delete(session.sessionId);
    session.backendHandle = null;
    proc.exit(proc.exitCode);
    proc.wake();
  }

  /** Number of cleanup() calls recorded for a session. */
  cleanupCalls(sessionId: string): number {
    return this.calls.filter((call) => call === `cleanup:${sessionId}`).length;
  }
}
