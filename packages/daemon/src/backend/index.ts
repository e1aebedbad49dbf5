/**
 * Backend selection: exactly one implementation per platform.
 */

import type { NodePtyBackendOptions } from "./node-pty-backend.js";
import type { TerminalBackend } from "./types.js";
import { UnixBackend, type UnixBackendOptions } from "./unix-backend.js";
import { WindowsBackend, type WindowsBackendOptions } from "./windows-backend.js";

export type BackendOptions = NodePtyBackendOptions & UnixBackendOptions & WindowsBackendOptions;

export function createBackend(
  platform: NodeJS.Platform = process.platform,
  options: BackendOptions = {}
): TerminalBackend {
  return platform === "win32" ? new WindowsBackend(options) : new UnixBackend(options);
}

export type { TerminalBackend, TerminalSize } from "./types.js";
export { UnixBackend } from "./unix-backend.js";
export { WindowsBackend } from "./windows-backend.js";
export { getDefaultShell, parseCommandLine, resolveExecutable, splitArgs } from "./shell.js";
