/**
 * Error taxonomy shared by the backend, registry and protocol layers.
 *
 * Every error carries a stable `code` so protocol handlers can answer with a
 * structured `{ code, message }` payload instead of dropping the request.
 */

export type ErrorCode =
  | "PROCESS_START_FAILED"
  | "SESSION_NOT_FOUND"
  | "CAPACITY_EXCEEDED"
  | "BACKEND_IO_ERROR"
  | "INVALID_MESSAGE";

/** Wire shape of a structured error. */
export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export class PtyHubError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "PtyHubError";
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

/** The backend could not spawn the requested command. */
export class ProcessStartError extends PtyHubError {
  constructor(public readonly command: string, reason?: string) {
    super("PROCESS_START_FAILED", `Failed to start process: ${command}${reason ? ` (${reason})` : ""}`);
    this.name = "ProcessStartError";
  }
}

export class SessionNotFoundError extends PtyHubError {
  constructor(public readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class CapacityExceededError extends PtyHubError {
  constructor(public readonly maxSessions: number) {
    super("CAPACITY_EXCEEDED", `Maximum number of sessions reached (${maxSessions})`);
    this.name = "CapacityExceededError";
  }
}

/**
 * A PTY read/write/poll failed. Pumps log these and consult `isAlive()`
 * rather than tearing the session down on the spot.
 */
export class BackendIOError extends PtyHubError {
  constructor(
    public readonly sessionId: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super("BACKEND_IO_ERROR", `${operation} failed for session ${sessionId}: ${getErrorMessage(cause)}`);
    this.name = "BackendIOError";
  }
}

/** An inbound message failed validation. */
export class InvalidMessageError extends PtyHubError {
  constructor(message: string) {
    super("INVALID_MESSAGE", message);
    this.name = "InvalidMessageError";
  }
}

/**
 * Extract a human-readable error message from an unknown error.
 * Handles Error objects, strings, and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Convert any thrown value into a structured error payload.
 * Unknown errors are reported as backend I/O failures.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof PtyHubError) {
    return error.toPayload();
  }
  return { code: "BACKEND_IO_ERROR", message: getErrorMessage(error) };
}
