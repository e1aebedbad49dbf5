/**
 * TerminalSession - the record describing one hosted shell process.
 */

export type BackendPlatform = "unix" | "windows";

/**
 * Public view of a backend's process handle. The backend that populated it
 * is the only component allowed to act on it.
 */
export interface BackendHandle {
  readonly pid: number;
  readonly platform: BackendPlatform;
}

/** Why a session ended, reported to clients in `session_closed`. */
export type SessionCloseReason = "exited" | "closed" | "idle_timeout" | "shutdown";

export interface TerminalSession {
  readonly sessionId: string;
  command: string;
  args: string[];
  cwd: string | null;
  env: Record<string, string>;
  rows: number;
  cols: number;
  /** Epoch milliseconds */
  readonly createdAt: number;
  /** Epoch milliseconds of the last output, input or heartbeat */
  lastActivity: number;
  active: boolean;
  backendHandle: BackendHandle | null;
  /** Exit code recorded by the backend once the process has exited */
  exitCode: number | null;
  /** Set once `session_closed` has been delivered to the room */
  closeNotified: boolean;
  /** Backend-specific extras (e.g. the resolved executable path) */
  metadata: Record<string, unknown>;
}

export interface NewSessionFields {
  sessionId: string;
  command: string;
  args: string[];
  cwd: string | null;
  env: Record<string, string>;
  rows: number;
  cols: number;
  now: number;
}

export function createSessionRecord(fields: NewSessionFields): TerminalSession {
  return {
    sessionId: fields.sessionId,
    command: fields.command,
    args: fields.args,
    cwd: fields.cwd,
    env: fields.env,
    rows: fields.rows,
    cols: fields.cols,
    createdAt: fields.now,
    lastActivity: fields.now,
    active: true,
    backendHandle: null,
    exitCode: null,
    closeNotified: false,
    metadata: {},
  };
}

/** Wire representation used by the HTTP API. */
export interface SessionInfo {
  session_id: string;
  command: string;
  args: string[];
  cwd: string | null;
  rows: number;
  cols: number;
  pid: number | null;
  created_at: string;
  last_activity: string;
  active: boolean;
}

export function toSessionInfo(session: TerminalSession): SessionInfo {
  return {
    session_id: session.sessionId,
    command: session.command,
    args: session.args,
    cwd: session.cwd,
    rows: session.rows,
    cols: session.cols,
    pid: session.backendHandle?.pid ?? null,
    created_at: new Date(session.createdAt).toISOString(),
    last_activity: new Date(session.lastActivity).toISOString(),
    active: session.active,
  };
}
