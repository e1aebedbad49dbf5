/**
 * ProtocolHandler - translates client events into registry, backend and
 * router calls.
 *
 * Every event that names a session is checked against the registry first.
 * Failures are answered with structured errors; nothing is silently dropped.
 */

import type { TerminalBackend } from "../backend/types.js";
import { recordError as recordErrorMetric } from "../telemetry/metrics.js";
import { BackendIOError, toErrorPayload } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { SessionLifecycleManager } from "./lifecycle-manager.js";
import {
  parseClientMessage,
  type ClientMessage,
  type RequestId,
} from "./protocol.js";
import type { Connection, Router } from "./router.js";
import type { SessionRegistry } from "./session-registry.js";

const logger = createLogger("PROTOCOL");

export interface ProtocolHandlerDeps {
  registry: SessionRegistry;
  router: Router;
  backend: TerminalBackend;
  lifecycle: SessionLifecycleManager;
  /** Join the creating connection to the new session's room (default true) */
  attachOnCreate?: boolean;
}

type MessageOf<T extends ClientMessage["type"]> = Extract<ClientMessage, { type: T }>;

interface ErrorContext {
  request_id?: RequestId;
  session_id?: string;
}

export class ProtocolHandler {
  private readonly registry: SessionRegistry;
  private readonly router: Router;
  private readonly backend: TerminalBackend;
  private readonly lifecycle: SessionLifecycleManager;
  private readonly attachOnCreate: boolean;

  constructor(deps: ProtocolHandlerDeps) {
    this.registry = deps.registry;
    this.router = deps.router;
    this.backend = deps.backend;
    this.lifecycle = deps.lifecycle;
    this.attachOnCreate = deps.attachOnCreate ?? true;
  }

  /**
   * Transport-level connect: join the room named at connection time.
   * @returns false when the session does not exist (the transport rejects the connection)
   */
  handleOpen(connection: Connection, sessionId: string): boolean {
    const session = this.registry.get(sessionId);
    if (!session || !session.active) {
      logger.warn(`${connection.id} rejected: unknown session ${sessionId}`);
      return false;
    }
    this.router.join(connection, sessionId);
    logger.info(`${connection.id} connected to session ${sessionId}`);
    return true;
  }

  /**
   * Handle one raw client frame.
   */
  async handleMessage(connection: Connection, data: string): Promise<void> {
    const parsed = parseClientMessage(data);
    if (!parsed.ok) {
      recordErrorMetric("invalid_message", { event: parsed.event });
      connection.send({
        type: "error",
        event: parsed.event,
        ...(parsed.request_id !== undefined ? { request_id: parsed.request_id } : {}),
        ...(parsed.session_id !== undefined ? { session_id: parsed.session_id } : {}),
        error: parsed.error,
      });
      return;
    }

    const message = parsed.message;
    try {
      await this.dispatch(connection, message);
    } catch (error) {
      this.sendError(connection, message.type, error, {
        request_id: "request_id" in message ? message.request_id : undefined,
        session_id: "session_id" in message ? message.session_id : undefined,
      });
    }
  }

  /**
   * Transport-level disconnect: leave every room. Sessions keep running.
   */
  handleClose(connection: Connection): void {
    const left = this.router.leaveAll(connection);
    if (left.length > 0) {
      logger.debug(`${connection.id} left ${left.join(", ")}`);
    }
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private async dispatch(connection: Connection, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case "create_session":
        this.handleCreateSession(connection, message);
        break;

      case "connect":
        this.handleConnect(connection, message);
        break;

      case "disconnect":
        this.registry.require(message.session_id);
        this.router.leave(connection, message.session_id);
        connection.send({ type: "disconnect", session_id: message.session_id, request_id: message.request_id });
        break;

      case "pty-input":
        this.handleInput(message);
        break;

      case "resize":
        this.handleResize(connection, message);
        break;

      case "heartbeat":
        if (!this.lifecycle.heartbeat(message.session_id)) {
          this.registry.require(message.session_id);
        }
        break;

      case "close_session":
        this.registry.require(message.session_id);
        await this.registry.destroy(message.session_id, "closed");
        connection.send({ type: "close_session", session_id: message.session_id, request_id: message.request_id });
        break;

      case "ping":
        connection.send({ type: "pong" });
        break;
    }
  }

  private handleCreateSession(connection: Connection, message: MessageOf<"create_session">): void {
    const { type: _type, request_id, ...params } = message;
    try {
      const sessionId = this.registry.create(params);
      if (this.attachOnCreate) {
        this.router.join(connection, sessionId);
      }
      connection.send({ type: "create_session", request_id, session_id: sessionId });
    } catch (error) {
      logger.warn(`create_session from ${connection.id} failed: ${toErrorPayload(error).message}`);
      connection.send({ type: "create_session", request_id, error: toErrorPayload(error) });
    }
  }

  private handleConnect(connection: Connection, message: MessageOf<"connect">): void {
    this.registry.require(message.session_id);
    this.router.join(connection, message.session_id);
    connection.send({ type: "connect", session_id: message.session_id, request_id: message.request_id });
  }

  private handleInput(message: MessageOf<"pty-input">): void {
    const session = this.registry.require(message.session_id);
    if (!this.backend.writeInput(session, message.input)) {
      throw new BackendIOError(message.session_id, "write", "process is not accepting input");
    }
    this.registry.touch(message.session_id);
  }

  private handleResize(connection: Connection, message: MessageOf<"resize">): void {
    const session = this.registry.require(message.session_id);
    if (!this.backend.resize(session, message.rows, message.cols)) {
      throw new BackendIOError(message.session_id, "resize", "PTY rejected the new size");
    }
    connection.send({
      type: "resize",
      session_id: message.session_id,
      rows: message.rows,
      cols: message.cols,
      request_id: message.request_id,
    });
  }

  private sendError(connection: Connection, event: string, error: unknown, context: ErrorContext): void {
    const payload = toErrorPayload(error);
    recordErrorMetric(payload.code.toLowerCase(), { event });
    logger.debug(`${event} from ${connection.id} failed: ${payload.message}`);
    connection.send({
      type: "error",
      event,
      ...(context.request_id !== undefined ? { request_id: context.request_id } : {}),
      ...(context.session_id !== undefined ? { session_id: context.session_id } : {}),
      error: payload,
    });
  }
}
