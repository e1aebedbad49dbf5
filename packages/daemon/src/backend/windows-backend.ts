/**
 * Windows backend: ConPTY via node-pty. ConPTY has no signals, so
 * termination is a plain kill of the pseudoconsole's process.
 */

import type * as pty from "node-pty";
import { PTY_TERMINATE_GRACE_MS } from "../config/index.js";
import type { TerminalSession } from "../gateway/session.js";
import { NodePtyBackend, type NodePtyBackendOptions, type PtyHandle } from "./node-pty-backend.js";

export interface WindowsBackendOptions extends NodePtyBackendOptions {
  /** How long to wait for the exit event after kill() */
  terminateGraceMs?: number;
}

export class WindowsBackend extends NodePtyBackend {
  readonly platform = "windows" as const;
  private readonly terminateGraceMs: number;

  constructor(options: WindowsBackendOptions = {}) {
    super(options);
    this.terminateGraceMs = options.terminateGraceMs ?? PTY_TERMINATE_GRACE_MS;
  }

  protected spawnOptions(
    session: TerminalSession,
    env: Record<string, string>,
    cwd: string
  ): pty.IWindowsPtyForkOptions {
    return {
      name: env.TERM,
      cols: session.cols,
      rows: session.rows,
      cwd,
      env,
      useConpty: true,
    };
  }

  protected async terminate(handle: PtyHandle): Promise<void> {
    handle.process.kill();
    if (!(await this.waitForExit(handle, this.terminateGraceMs))) {
      this.logger.warn(`Session ${handle.sessionId} did not report exit after kill`);
    }
  }
}
