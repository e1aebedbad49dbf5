/**
 * Map domain errors onto HTTP responses.
 */

import type { Context } from "hono";
import { toErrorPayload, type ErrorCode } from "../../utils/errors.js";

export type ErrorStatus = 400 | 404 | 422 | 500 | 503;

const STATUS_BY_CODE: Record<ErrorCode, ErrorStatus> = {
  INVALID_MESSAGE: 400,
  SESSION_NOT_FOUND: 404,
  PROCESS_START_FAILED: 422,
  BACKEND_IO_ERROR: 500,
  CAPACITY_EXCEEDED: 503,
};

export function statusForError(code: ErrorCode): ErrorStatus {
  return STATUS_BY_CODE[code];
}

/** Standard error response helper */
export function errorResponse(c: Context, error: unknown) {
  const payload = toErrorPayload(error);
  return c.json({ error: payload }, statusForError(payload.code));
}
