/**
 * Span helper utilities for manual instrumentation.
 */

import { trace, SpanStatusCode, type Span, type Tracer } from "@opentelemetry/api";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";

const tracer = trace.getTracer(TELEMETRY_CONFIG.serviceName);

type SpanAttributes = Record<string, string | number | boolean>;

function setAttributes(span: Span, attributes?: SpanAttributes): void {
  if (!attributes) return;
  for (const [key, value] of Object.entries(attributes)) {
    span.setAttribute(key, value);
  }
}

/**
 * Wrap an async function with a span.
 *
 * Automatically records errors and sets span status.
 *
 * @example
 * ```ts
 * await withSpan("session.destroy", async (span) => {
 *   span.setAttribute("pty.session_id", id);
 *   await backend.cleanup(session);
 * });
 * ```
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: SpanAttributes
): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      setAttributes(span, attributes);
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordError(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Wrap a synchronous function with a span.
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: SpanAttributes
): T {
  const span = tracer.startSpan(name);

  try {
    setAttributes(span, attributes);
    const result = fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    recordError(span, error);
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Record an error on a span with standardized attributes.
 */
export function recordError(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });

  if (error instanceof Error) {
    span.recordException(error);
    span.setAttribute("error.type", error.name);
    span.setAttribute("error.message", error.message);
  } else {
    span.setAttribute("error.message", String(error));
  }
}

/**
 * Add PTY-specific attributes to a span.
 */
export function addPtyAttributes(
  span: Span,
  pty: {
    sessionId?: string;
    pid?: number;
    cols?: number;
    rows?: number;
    command?: string;
  }
): void {
  if (pty.sessionId) {
    span.setAttribute("pty.session_id", pty.sessionId);
  }
  if (pty.pid) {
    span.setAttribute("pty.pid", pty.pid);
  }
  if (pty.cols) {
    span.setAttribute("pty.cols", pty.cols);
  }
  if (pty.rows) {
    span.setAttribute("pty.rows", pty.rows);
  }
  if (pty.command) {
    span.setAttribute("pty.command", pty.command);
  }
}

/**
 * Get the tracer for creating custom spans.
 */
export function getTracer(): Tracer {
  return tracer;
}
