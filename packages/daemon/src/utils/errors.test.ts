/**
 * Error taxonomy and timeout helper tests
 */

import { describe, it, expect } from "vitest";
import {
  BackendIOError,
  CapacityExceededError,
  PtyHubError,
  SessionNotFoundError,
  getErrorMessage,
  toErrorPayload,
} from "./errors.js";
import { isErrnoException } from "./type-guards.js";
import { TimeoutError, withTimeout } from "./timeout.js";
import { statusForError } from "../api/helpers/error-response.js";

describe("toErrorPayload", () => {
  it("keeps the code of domain errors", () => {
    expect(toErrorPayload(new SessionNotFoundError("s1"))).toEqual({
      code: "SESSION_NOT_FOUND",
      message: "Session not found: s1",
    });
    expect(toErrorPayload(new CapacityExceededError(3))).toEqual({
      code: "CAPACITY_EXCEEDED",
      message: "Maximum number of sessions reached (3)",
    });
  });

  it("reports anything else as a backend I/O error", () => {
    expect(toErrorPayload(new Error("boom"))).toEqual({ code: "BACKEND_IO_ERROR", message: "boom" });
    expect(toErrorPayload("plain")).toEqual({ code: "BACKEND_IO_ERROR", message: "plain" });
  });

  it("names the failed operation", () => {
    const error = new BackendIOError("s1", "write", new Error("EIO"));
    expect(error).toBeInstanceOf(PtyHubError);
    expect(error.message).toBe("write failed for session s1: EIO");
  });
});

describe("helpers", () => {
  it("getErrorMessage stringifies non-errors", () => {
    expect(getErrorMessage(42)).toBe("42");
  });

  it("isErrnoException requires a string code", () => {
    expect(isErrnoException(Object.assign(new Error("x"), { code: "ESRCH" }))).toBe(true);
    expect(isErrnoException(new Error("x"))).toBe(false);
    expect(isErrnoException({ code: "ESRCH" })).toBe(false);
  });

  it("maps error codes to HTTP statuses", () => {
    expect(statusForError("SESSION_NOT_FOUND")).toBe(404);
    expect(statusForError("CAPACITY_EXCEEDED")).toBe(503);
    expect(statusForError("PROCESS_START_FAILED")).toBe(422);
  });
});

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50)).resolves.toBe("ok");
  });

  it("rejects with TimeoutError when the promise is too slow", async () => {
    const never = new Promise<void>(() => undefined);
    await expect(withTimeout(never, 10, "Shutdown")).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never, 10, "Shutdown")).rejects.toThrow("Shutdown after 10ms");
  });
});
