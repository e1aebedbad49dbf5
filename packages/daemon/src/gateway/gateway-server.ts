/**
 * GatewayServer - WebSocket transport for the PTY event protocol.
 *
 * Accepts upgrades at `/pty`, `/pty?session_id=<id>` or `/pty/<id>`. Naming
 * a session at connect time joins its room; an unknown id closes the socket
 * with 4004. Frames are handed to the ProtocolHandler.
 */

import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";
import { GATEWAY_HOST, GATEWAY_PATH, GATEWAY_PORT, getGatewayUrl } from "../config/index.js";
import { recordGatewayConnections } from "../telemetry/metrics.js";
import { SessionNotFoundError } from "../utils/errors.js";
import { createLogger, logSilentError } from "../utils/logger.js";
import type { ProtocolHandler } from "./protocol-handler.js";
import { serializeServerMessage, type ServerMessage } from "./protocol.js";
import type { Connection } from "./router.js";
import type { SessionRegistry } from "./session-registry.js";

const logger = createLogger("GATEWAY");

/** Close codes sent to rejected or evicted clients. */
export const CLOSE_CODES = {
  INVALID_PATH: 4000,
  SESSION_NOT_FOUND: 4004,
  GOING_AWAY: 1001,
} as const;

export interface GatewayServerOptions {
  handler: ProtocolHandler;
  registry: SessionRegistry;
  /** Host to bind to (default: 127.0.0.1) */
  host?: string;
  /** Port to listen on; 0 picks a free port */
  port?: number;
}

/**
 * A WebSocket seen through the transport-agnostic Connection interface.
 */
export class WsConnection implements Connection {
  constructor(
    readonly id: string,
    private readonly ws: WebSocket
  ) {}

  send(message: ServerMessage): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(serializeServerMessage(message));
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Extract the session id named by the upgrade URL, if any.
 * @returns undefined for a bare `/pty`, null when the path is not ours
 */
export function sessionIdFromUrl(rawUrl: string | undefined): string | null | undefined {
  let url: URL;
  try {
    url = new URL(rawUrl || "/", "http://localhost");
  } catch (error) {
    logSilentError(`unparseable upgrade URL ${rawUrl}`, error);
    return null;
  }
  const parts = url.pathname.split("/").filter(Boolean);
  const base = GATEWAY_PATH.replace(/^\//, "");

  if (parts[0] !== base || parts.length > 2) {
    return null;
  }
  if (parts.length === 2) {
    try {
      return decodeURIComponent(parts[1]);
    } catch (error) {
      // Malformed percent-encoding
      logSilentError(`undecodable session id ${parts[1]}`, error);
      return null;
    }
  }
  return url.searchParams.get("session_id") ?? undefined;
}

export class GatewayServer {
  private wss: WebSocketServer | null = null;
  private clients = new Map<WebSocket, WsConnection>();
  private readonly handler: ProtocolHandler;
  private readonly registry: SessionRegistry;
  private readonly host: string;
  private readonly requestedPort: number;
  private boundPort: number | null = null;

  constructor(options: GatewayServerOptions) {
    this.handler = options.handler;
    this.registry = options.registry;
    this.host = options.host ?? GATEWAY_HOST;
    this.requestedPort = options.port ?? GATEWAY_PORT;
  }

  /**
   * Start listening.
   * @returns the bound port (useful when configured with port 0)
   */
  async start(): Promise<number> {
    if (this.wss && this.boundPort !== null) {
      return this.boundPort;
    }

    const wss = new WebSocketServer({ host: this.host, port: this.requestedPort });
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      wss.once("listening", () => resolve());
      wss.once("error", reject);
    });

    const address = wss.address();
    this.boundPort = typeof address === "string" ? this.requestedPort : address.port;

    wss.on("connection", (ws, req) => this.handleConnection(ws, req));
    wss.on("error", (error) => {
      logger.error("WebSocket server error", error);
    });

    logger.info(`WebSocket server listening on ${getGatewayUrl(this.host, this.boundPort)}`);
    return this.boundPort;
  }

  /**
   * Close every client connection and the listening socket. Sessions are
   * left to the registry.
   */
  async stop(): Promise<void> {
    for (const ws of this.clients.keys()) {
      ws.close(CLOSE_CODES.GOING_AWAY, "Server shutting down");
    }
    this.clients.clear();
    recordGatewayConnections(0);

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      this.wss = null;
      this.boundPort = null;
    }

    logger.info("Server stopped");
  }

  /** Port the server is bound to, or null when stopped. */
  get port(): number | null {
    return this.boundPort;
  }

  /** Number of open client connections. */
  get connectionCount(): number {
    return this.clients.size;
  }

  /**
   * URL a client opens to attach to `sessionId`.
   * @throws SessionNotFoundError for unknown sessions
   * @throws Error when the server is not listening
   */
  getSessionUrl(sessionId: string): string {
    if (!this.registry.get(sessionId)?.active) {
      throw new SessionNotFoundError(sessionId);
    }
    if (this.boundPort === null) {
      throw new Error("Gateway server is not running");
    }
    return getGatewayUrl(this.host, this.boundPort, sessionId);
  }

  /**
   * Wire a freshly upgraded socket to the protocol handler.
   */
  handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const sessionId = sessionIdFromUrl(req.url);
    if (sessionId === null) {
      ws.close(CLOSE_CODES.INVALID_PATH, "Invalid path");
      return;
    }

    const connection = new WsConnection(randomUUID().slice(0, 8), ws);

    if (sessionId !== undefined && !this.handler.handleOpen(connection, sessionId)) {
      ws.close(CLOSE_CODES.SESSION_NOT_FOUND, "Session not found");
      return;
    }

    this.clients.set(ws, connection);
    recordGatewayConnections(this.clients.size);
    logger.info(`Client ${connection.id} connected (total: ${this.clients.size})`);

    ws.on("message", (data) => {
      this.handler.handleMessage(connection, rawDataToString(data)).catch((error) => {
        logger.error(`Message from ${connection.id} failed`, error);
      });
    });

    ws.on("close", () => {
      this.handler.handleClose(connection);
      this.clients.delete(ws);
      recordGatewayConnections(this.clients.size);
      logger.info(`Client ${connection.id} disconnected (remaining: ${this.clients.size})`);
    });

    ws.on("error", (error) => {
      logger.error(`Client ${connection.id} error`, error);
    });
  }
}
