/**
 * PTY gateway wire protocol.
 *
 * Every frame is a JSON object `{ "type": <event>, ...payload }`. Field names
 * are snake_case on the wire.
 */

import { z } from "zod";
import type { ErrorPayload } from "../utils/errors.js";
import { isRecord } from "../utils/type-guards.js";
import type { SessionCloseReason } from "./session.js";

// =============================================================================
// Client → Server Messages
// =============================================================================

const SessionIdSchema = z.string().min(1, "session_id is required");
const RequestIdSchema = z.union([z.string(), z.number()]);
const DimensionSchema = z.number().int().positive();

export type RequestId = z.infer<typeof RequestIdSchema>;

/** Parameters accepted by `create_session` and `POST /sessions`. */
export const CreateSessionParamsSchema = z.object({
  command: z.string().trim().min(1).optional(),
  args: z.union([z.array(z.string()), z.string()]).optional(),
  cwd: z.string().min(1).nullish(),
  env: z.record(z.string()).optional(),
  rows: DimensionSchema.optional(),
  cols: DimensionSchema.optional(),
});

export type CreateSessionParams = z.infer<typeof CreateSessionParamsSchema>;

export const ResizeParamsSchema = z.object({
  rows: DimensionSchema,
  cols: DimensionSchema,
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  CreateSessionParamsSchema.extend({
    type: z.literal("create_session"),
    request_id: RequestIdSchema.optional(),
  }),
  z.object({
    type: z.literal("connect"),
    session_id: SessionIdSchema,
    request_id: RequestIdSchema.optional(),
  }),
  z.object({
    type: z.literal("disconnect"),
    session_id: SessionIdSchema,
    request_id: RequestIdSchema.optional(),
  }),
  z.object({
    type: z.literal("pty-input"),
    session_id: SessionIdSchema,
    input: z.string(),
  }),
  ResizeParamsSchema.extend({
    type: z.literal("resize"),
    session_id: SessionIdSchema,
    request_id: RequestIdSchema.optional(),
  }),
  z.object({
    type: z.literal("heartbeat"),
    session_id: SessionIdSchema,
  }),
  z.object({
    type: z.literal("close_session"),
    session_id: SessionIdSchema,
    request_id: RequestIdSchema.optional(),
  }),
  z.object({
    type: z.literal("ping"),
  }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// =============================================================================
// Server → Client Messages
// =============================================================================

export interface PtyOutputMessage {
  type: "pty-output";
  session_id: string;
  output: string;
}

/** Terminal notice: no further output follows for this session. */
export interface SessionClosedMessage {
  type: "session_closed";
  session_id: string;
  /** null when the server terminated a process that had not exited */
  exit_code: number | null;
  reason: SessionCloseReason;
}

export type CreateSessionResponse =
  | { type: "create_session"; request_id?: RequestId; session_id: string }
  | { type: "create_session"; request_id?: RequestId; error: ErrorPayload };

export interface ConnectResponse {
  type: "connect";
  request_id?: RequestId;
  session_id: string;
}

export interface DisconnectResponse {
  type: "disconnect";
  request_id?: RequestId;
  session_id: string;
}

export interface ResizeResponse {
  type: "resize";
  request_id?: RequestId;
  session_id: string;
  rows: number;
  cols: number;
}

export interface CloseSessionResponse {
  type: "close_session";
  request_id?: RequestId;
  session_id: string;
}

export interface PongMessage {
  type: "pong";
}

export interface ErrorMessage {
  type: "error";
  /** The client event that failed */
  event: string;
  request_id?: RequestId;
  session_id?: string;
  error: ErrorPayload;
}

export type ServerMessage =
  | PtyOutputMessage
  | SessionClosedMessage
  | CreateSessionResponse
  | ConnectResponse
  | DisconnectResponse
  | ResizeResponse
  | CloseSessionResponse
  | PongMessage
  | ErrorMessage;

// =============================================================================
// Parsing
// =============================================================================

export type ParseResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; event: string; request_id?: RequestId; session_id?: string; error: ErrorPayload };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "message"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse and validate a client frame.
 */
export function parseClientMessage(data: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return {
      ok: false,
      event: "unknown",
      error: { code: "INVALID_MESSAGE", message: "Message is not valid JSON" },
    };
  }

  if (!isRecord(raw)) {
    return {
      ok: false,
      event: "unknown",
      error: { code: "INVALID_MESSAGE", message: "Message must be a JSON object" },
    };
  }

  const result = ClientMessageSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, message: result.data };
  }

  const requestId = RequestIdSchema.safeParse(raw.request_id);
  return {
    ok: false,
    event: typeof raw.type === "string" ? raw.type : "unknown",
    ...(requestId.success ? { request_id: requestId.data } : {}),
    ...(typeof raw.session_id === "string" ? { session_id: raw.session_id } : {}),
    error: { code: "INVALID_MESSAGE", message: describeIssues(result.error) },
  };
}

/**
 * Serialize a server message to a JSON string.
 */
export function serializeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}
