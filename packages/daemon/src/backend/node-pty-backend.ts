/**
 * NodePtyBackend - shared node-pty plumbing for the Unix and Windows backends.
 *
 * node-pty pushes output through `onData`; the TerminalBackend contract is
 * pull-based (`poll` + `readOutput`). Each handle therefore keeps a pending
 * queue bounded to one read chunk: once the queue is full the PTY is paused,
 * and reads resume it, so a slow consumer stalls the child through the
 * kernel PTY buffer instead of growing memory.
 */

import * as pty from "node-pty";
import fs from "node:fs";
import { PTY_READ_CHUNK_CHARS, PTY_TERM_NAME } from "../config/index.js";
import type { BackendPlatform, TerminalSession } from "../gateway/session.js";
import { BackendIOError } from "../utils/errors.js";
import { createLogger, logSilentError, type Logger } from "../utils/logger.js";
import { delay } from "../utils/timeout.js";
import { resolveExecutable as defaultResolveExecutable } from "./shell.js";
import type { TerminalBackend, TerminalSize } from "./types.js";

export interface PtyHandle {
  readonly sessionId: string;
  readonly process: pty.IPty;
  pending: string[];
  pendingLength: number;
  paused: boolean;
  exited: boolean;
  exitCode: number | null;
  /** Resolves once the process has exited */
  readonly exitedPromise: Promise<void>;
  /** Wakes a pending `poll()` */
  waiter: (() => void) | null;
  readonly disposables: pty.IDisposable[];
}

export interface NodePtyBackendOptions {
  /** Maps a command to an executable path, or null when it cannot be run */
  resolveExecutable?: (command: string, env: Record<string, string>) => string | null;
  /** Pending-queue bound before the PTY is paused */
  readChunkChars?: number;
  /** Default TERM for spawned processes */
  termName?: string;
}

export abstract class NodePtyBackend implements TerminalBackend {
  abstract readonly platform: BackendPlatform;

  protected readonly handles = new Map<string, PtyHandle>();
  protected readonly logger: Logger = createLogger("BACKEND");
  private readonly resolveCommand: (command: string, env: Record<string, string>) => string | null;
  private readonly readChunkChars: number;
  private readonly termName: string;

  constructor(options: NodePtyBackendOptions = {}) {
    this.resolveCommand = options.resolveExecutable ?? ((command, env) => defaultResolveExecutable(command, env));
    this.readChunkChars = options.readChunkChars ?? PTY_READ_CHUNK_CHARS;
    this.termName = options.termName ?? PTY_TERM_NAME;
  }

  /** Platform-specific spawn options. */
  protected abstract spawnOptions(
    session: TerminalSession,
    env: Record<string, string>,
    cwd: string
  ): pty.IPtyForkOptions | pty.IWindowsPtyForkOptions;

  /** Stop a still-running process. Resolves once it exited or was given up on. */
  protected abstract terminate(handle: PtyHandle): Promise<void>;

  // ===========================================================================
  // TerminalBackend
  // ===========================================================================

  startProcess(session: TerminalSession): boolean {
    if (this.handles.has(session.sessionId)) {
      this.logger.warn(`Session ${session.sessionId} already has a process`);
      return false;
    }

    const env = this.buildEnv(session);
    const file = this.resolveCommand(session.command, env);
    if (!file) {
      this.logger.error(`Command not found or not executable: ${session.command}`);
      return false;
    }

    const cwd = this.resolveCwd(session);

    let proc: pty.IPty;
    try {
      proc = pty.spawn(file, session.args, this.spawnOptions(session, env, cwd));
    } catch (error) {
      this.logger.error(`Failed to spawn ${file} for session ${session.sessionId}`, error);
      return false;
    }

    let markExited: () => void = () => undefined;
    const exitedPromise = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    const handle: PtyHandle = {
      sessionId: session.sessionId,
      process: proc,
      pending: [],
      pendingLength: 0,
      paused: false,
      exited: false,
      exitCode: null,
      exitedPromise,
      waiter: null,
      disposables: [],
    };

    handle.disposables.push(
      proc.onData((data) => this.handleData(handle, data)),
      proc.onExit(({ exitCode }) => {
        handle.exited = true;
        handle.exitCode = exitCode;
        session.exitCode = exitCode;
        this.logger.debug(`Session ${session.sessionId} exited with code ${exitCode}`);
        markExited();
        this.wake(handle);
      })
    );

    this.handles.set(session.sessionId, handle);
    session.backendHandle = { pid: proc.pid, platform: this.platform };
    session.metadata.executable = file;
    session.metadata.cwd = cwd;

    this.logger.info(`Started ${file} for session ${session.sessionId} (pid=${proc.pid})`);
    return true;
  }

  readOutput(session: TerminalSession, maxChars: number): string | null {
    const handle = this.handles.get(session.sessionId);
    if (!handle || handle.pendingLength === 0 || maxChars <= 0) {
      return null;
    }

    let output = "";
    while (handle.pending.length > 0) {
      const chunk = handle.pending[0];
      const room = maxChars - output.length;
      if (chunk.length <= room) {
        output += chunk;
        handle.pending.shift();
        continue;
      }
      if (output.length === 0) {
        const cut = splitPoint(chunk, room);
        output = chunk.slice(0, cut);
        handle.pending[0] = chunk.slice(cut);
      }
      break;
    }
    handle.pendingLength -= output.length;

    if (handle.paused && handle.pendingLength < this.readChunkChars && !handle.exited) {
      try {
        handle.process.resume();
        handle.paused = false;
      } catch (error) {
        this.logger.error(new BackendIOError(session.sessionId, "resume", error).message);
      }
    }

    return output;
  }

  writeInput(session: TerminalSession, data: string): boolean {
    const handle = this.handles.get(session.sessionId);
    if (!handle || handle.exited) {
      return false;
    }

    try {
      handle.process.write(data);
      return true;
    } catch (error) {
      this.logger.error(new BackendIOError(session.sessionId, "write", error).message);
      return false;
    }
  }

  resize(session: TerminalSession, rows: number, cols: number): boolean {
    const handle = this.handles.get(session.sessionId);
    if (!handle || handle.exited || rows <= 0 || cols <= 0) {
      return false;
    }

    try {
      handle.process.resize(cols, rows);
      session.rows = rows;
      session.cols = cols;
      return true;
    } catch (error) {
      this.logger.error(new BackendIOError(session.sessionId, "resize", error).message);
      return false;
    }
  }

  getSize(session: TerminalSession): TerminalSize | null {
    const handle = this.handles.get(session.sessionId);
    if (!handle) return null;
    return { rows: handle.process.rows, cols: handle.process.cols };
  }

  poll(session: TerminalSession, timeoutMs: number): Promise<boolean> {
    const handle = this.handles.get(session.sessionId);
    if (!handle) return Promise.resolve(false);
    if (handle.pendingLength > 0) return Promise.resolve(true);
    if (handle.exited) return Promise.resolve(false);

    // A single pump polls each session; release any stale waiter first.
    this.wake(handle);

    return new Promise<boolean>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        if (handle.waiter === finish) handle.waiter = null;
        resolve(handle.pendingLength > 0);
      };
      const timer = setTimeout(finish, timeoutMs);
      handle.waiter = finish;
    });
  }

  isAlive(session: TerminalSession): boolean {
    const handle = this.handles.get(session.sessionId);
    return !!handle && !handle.exited;
  }

  exitCode(session: TerminalSession): number | null {
    return this.handles.get(session.sessionId)?.exitCode ?? session.exitCode;
  }

  async cleanup(session: TerminalSession): Promise<void> {
    const handle = this.handles.get(session.sessionId);
    if (!handle) {
      return;
    }

    this.handles.delete(session.sessionId);
    session.backendHandle = null;
    this.wake(handle);

    try {
      if (!handle.exited) {
        if (handle.paused) {
          // A paused PTY never delivers its exit notification
          handle.process.resume();
          handle.paused = false;
        }
        await this.terminate(handle);
      }
    } catch (error) {
      this.logger.error(`Failed to terminate session ${session.sessionId}`, error);
    } finally {
      for (const disposable of handle.disposables) {
        disposable.dispose();
      }
      handle.pending = [];
      handle.pendingLength = 0;
    }

    this.logger.debug(`Released session ${session.sessionId}`);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /** Wait until the handle exits or `timeoutMs` elapses. */
  protected async waitForExit(handle: PtyHandle, timeoutMs: number): Promise<boolean> {
    if (handle.exited) return true;
    const abort = new AbortController();
    const exited = await Promise.race([
      handle.exitedPromise.then(() => true),
      delay(timeoutMs, abort.signal).then(() => false),
    ]);
    abort.abort();
    return exited;
  }

  private handleData(handle: PtyHandle, data: string): void {
    handle.pending.push(data);
    handle.pendingLength += data.length;

    if (!handle.paused && handle.pendingLength >= this.readChunkChars) {
      try {
        handle.process.pause();
        handle.paused = true;
      } catch (error) {
        logSilentError(`pause failed for session ${handle.sessionId}`, error);
      }
    }

    this.wake(handle);
  }

  private wake(handle: PtyHandle): void {
    const waiter = handle.waiter;
    handle.waiter = null;
    waiter?.();
  }

  private buildEnv(session: TerminalSession): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) env[key] = value;
    }
    env.TERM = this.termName;
    env.COLORTERM = "truecolor";
    return { ...env, ...session.env };
  }

  private resolveCwd(session: TerminalSession): string {
    if (!session.cwd) {
      return process.cwd();
    }
    try {
      if (fs.statSync(session.cwd).isDirectory()) {
        return session.cwd;
      }
    } catch (error) {
      logSilentError(`stat ${session.cwd}`, error);
    }
    this.logger.warn(`Working directory ${session.cwd} does not exist, using ${process.cwd()}`);
    return process.cwd();
  }
}

/** Largest cut point <= max that does not split a surrogate pair. */
function splitPoint(chunk: string, max: number): number {
  if (max <= 0) return 0;
  const code = chunk.charCodeAt(max - 1);
  return code >= 0xd800 && code <= 0xdbff && max > 1 ? max - 1 : max;
}
