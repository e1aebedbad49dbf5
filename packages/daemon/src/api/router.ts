/**
 * Hono API router for session management and health.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { createSessionRoutes } from "./routes/sessions.js";
import type { RouterDependencies } from "./types.js";

/**
 * Create the API router with all endpoints.
 */
export function createApiRouter(deps: RouterDependencies): Hono {
  const { registry, backend } = deps;
  const api = new Hono();

  // Browser clients are only expected from the local machine
  api.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin) return origin;
        try {
          const url = new URL(origin);
          if (url.hostname === "localhost" || url.hostname === "127.0.0.1") {
            return origin;
          }
          return null;
        } catch {
          return null;
        }
      },
    })
  );

  api.get("/health", (c) =>
    c.json({
      status: "ok",
      sessions: registry.listActive().length,
      maxSessions: registry.maxSessions,
      platform: backend.platform,
    })
  );

  api.route("/", createSessionRoutes(deps));

  return api;
}
