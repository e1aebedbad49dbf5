/**
 * Unix backend: fork + PTY via node-pty, signals to the process group.
 */

import type * as pty from "node-pty";
import { PTY_TERMINATE_GRACE_MS } from "../config/index.js";
import type { TerminalSession } from "../gateway/session.js";
import { isErrnoException } from "../utils/type-guards.js";
import { logSilentError } from "../utils/logger.js";
import { NodePtyBackend, type NodePtyBackendOptions, type PtyHandle } from "./node-pty-backend.js";

export interface UnixBackendOptions extends NodePtyBackendOptions {
  /** Delay between SIGTERM and SIGKILL */
  terminateGraceMs?: number;
  /** Signal delivery; a negative pid addresses the process group */
  kill?: (pid: number, signal: NodeJS.Signals | 0) => void;
}

export class UnixBackend extends NodePtyBackend {
  readonly platform = "unix" as const;
  private readonly terminateGraceMs: number;
  private readonly kill: (pid: number, signal: NodeJS.Signals | 0) => void;

  constructor(options: UnixBackendOptions = {}) {
    super(options);
    this.terminateGraceMs = options.terminateGraceMs ?? PTY_TERMINATE_GRACE_MS;
    this.kill = options.kill ?? ((pid, signal) => {
      process.kill(pid, signal);
    });
  }

  protected spawnOptions(
    session: TerminalSession,
    env: Record<string, string>,
    cwd: string
  ): pty.IPtyForkOptions {
    return {
      name: env.TERM,
      cols: session.cols,
      rows: session.rows,
      cwd,
      env,
      encoding: "utf8",
    };
  }

  /**
   * SIGTERM the process group, then SIGKILL it if still running after the
   * grace period.
   */
  protected async terminate(handle: PtyHandle): Promise<void> {
    const pid = handle.process.pid;

    this.signalGroup(handle, "SIGTERM");
    if (await this.waitForExit(handle, this.terminateGraceMs)) {
      return;
    }

    if (this.processExists(pid)) {
      this.logger.warn(`Session ${handle.sessionId} ignored SIGTERM, sending SIGKILL (pid=${pid})`);
      this.signalGroup(handle, "SIGKILL");
      await this.waitForExit(handle, this.terminateGraceMs);
    }
  }

  private signalGroup(handle: PtyHandle, signal: NodeJS.Signals): void {
    const pid = handle.process.pid;
    try {
      this.kill(-pid, signal);
    } catch (error) {
      logSilentError(`${signal} to process group ${pid}`, error);
      try {
        handle.process.kill(signal);
      } catch (fallbackError) {
        // Expected: the process is already gone
        logSilentError(`${signal} to pid ${pid}`, fallbackError);
      }
    }
  }

  private processExists(pid: number): boolean {
    try {
      this.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: exists but owned by someone else
      return isErrnoException(error) && error.code === "EPERM";
    }
  }
}
