/**
 * Session management endpoints.
 *
 * Routes:
 * - GET /sessions - List active sessions
 * - POST /sessions - Create a session
 * - GET /sessions/:id - Get session info
 * - GET /sessions/:id/url - WebSocket URL attaching to the session
 * - POST /sessions/:id/resize - Resize the session's terminal
 * - POST /sessions/:id/heartbeat - Keep the session alive
 * - DELETE /sessions/:id - Destroy the session
 */

import { Hono } from "hono";
import { CreateSessionParamsSchema, ResizeParamsSchema } from "../../gateway/protocol.js";
import { toSessionInfo } from "../../gateway/session.js";
import { BackendIOError, InvalidMessageError } from "../../utils/errors.js";
import { logSilentError } from "../../utils/logger.js";
import { errorResponse } from "../helpers/error-response.js";
import type { RouterDependencies } from "../types.js";

/** Read a JSON body, treating a missing or malformed body as empty. */
async function readJsonBody(req: { json: () => Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch (error) {
    logSilentError("request body is not JSON", error);
    return {};
  }
}

/**
 * Create session-related routes
 */
export function createSessionRoutes(deps: RouterDependencies): Hono {
  const { registry, lifecycle, backend, getSessionUrl } = deps;
  const router = new Hono();

  router.get("/sessions", (c) => {
    const sessions = registry
      .list()
      .filter((session) => session.active)
      .map(toSessionInfo);
    return c.json({ sessions });
  });

  router.post("/sessions", async (c) => {
    const parsed = CreateSessionParamsSchema.safeParse(await readJsonBody(c.req));
    if (!parsed.success) {
      return errorResponse(c, new InvalidMessageError(parsed.error.issues.map((i) => i.message).join("; ")));
    }

    let sessionId: string;
    try {
      sessionId = registry.create(parsed.data);
    } catch (error) {
      return errorResponse(c, error);
    }

    try {
      return c.json({ session_id: sessionId, url: getSessionUrl(sessionId) }, 201);
    } catch (error) {
      // The caller never learns the id; don't leave the session behind
      await registry.destroy(sessionId, "closed");
      return errorResponse(c, error);
    }
  });

  router.get("/sessions/:id", (c) => {
    try {
      return c.json(toSessionInfo(registry.require(c.req.param("id"))));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  router.get("/sessions/:id/url", (c) => {
    try {
      return c.json({ url: getSessionUrl(c.req.param("id")) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  router.post("/sessions/:id/resize", async (c) => {
    const sessionId = c.req.param("id");
    const parsed = ResizeParamsSchema.safeParse(await readJsonBody(c.req));
    if (!parsed.success) {
      return errorResponse(c, new InvalidMessageError("rows and cols must be positive integers"));
    }

    try {
      const session = registry.require(sessionId);
      if (!backend.resize(session, parsed.data.rows, parsed.data.cols)) {
        throw new BackendIOError(sessionId, "resize", "PTY rejected the new size");
      }
      return c.json({ rows: session.rows, cols: session.cols });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  router.post("/sessions/:id/heartbeat", (c) => {
    const sessionId = c.req.param("id");
    try {
      if (!lifecycle.heartbeat(sessionId)) {
        registry.require(sessionId);
      }
      return c.json({ ok: true });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  router.delete("/sessions/:id", async (c) => {
    const sessionId = c.req.param("id");
    try {
      registry.require(sessionId);
      await registry.destroy(sessionId, "closed");
      return c.json({ ok: true });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
