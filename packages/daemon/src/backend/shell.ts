/**
 * Shell defaults and command-line helpers shared by both backends.
 */

import fs from "node:fs";
import path from "node:path";
import { InvalidMessageError } from "../utils/errors.js";

type Platform = NodeJS.Platform;
type Env = Record<string, string | undefined>;

const UNIX_SHELL_FALLBACKS = ["/bin/bash", "/bin/zsh", "/bin/sh"];
const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/** Filesystem checks, swappable in tests. */
export interface FileChecks {
  isExecutableFile: (candidate: string) => boolean;
}

export const defaultFileChecks: FileChecks = {
  isExecutableFile: (candidate) => {
    try {
      if (!fs.statSync(candidate).isFile()) return false;
      fs.accessSync(candidate, fs.constants.X_OK);
      return true;
    } catch {
      // Expected: missing or not executable
      return false;
    }
  },
};

/**
 * Default interactive shell for the platform.
 * Windows: %COMSPEC%, else powershell.exe. Unix: $SHELL, else the first
 * existing of bash, zsh, sh.
 */
export function getDefaultShell(
  platform: Platform = process.platform,
  env: Env = process.env,
  files: FileChecks = defaultFileChecks
): string {
  if (platform === "win32") {
    return env.COMSPEC || "powershell.exe";
  }

  if (env.SHELL) {
    return env.SHELL;
  }

  return UNIX_SHELL_FALLBACKS.find((shell) => files.isExecutableFile(shell)) ?? "/bin/sh";
}

/**
 * Split a command line into arguments, honouring single quotes, double
 * quotes and backslash escapes the way a POSIX shell tokenizes words.
 *
 * @throws InvalidMessageError on an unterminated quote
 */
export function splitArgs(input: string): string[] {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
        current += input[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === "\\") {
      if (i + 1 < input.length) current += input[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new InvalidMessageError(`Unterminated ${quote} quote in: ${input}`);
  }
  if (inWord) {
    args.push(current);
  }
  return args;
}

/**
 * Normalize a requested command. A command containing whitespace and given
 * without separate args is treated as a full command line ("echo hi").
 */
export function parseCommandLine(
  command: string,
  args: string[] | string | undefined
): { command: string; args: string[] } {
  const argList = typeof args === "string" ? splitArgs(args) : (args ?? []);

  if (argList.length === 0 && /\s/.test(command.trim())) {
    const [head, ...rest] = splitArgs(command);
    if (head) {
      return { command: head, args: rest };
    }
  }

  return { command: command.trim(), args: argList };
}

/** Look up an env var case-insensitively (Windows spells PATH as "Path"). */
function envLookup(env: Env, name: string, platform: Platform): string | undefined {
  if (platform !== "win32") return env[name];
  const key = Object.keys(env).find((k) => k.toUpperCase() === name);
  return key ? env[key] : undefined;
}

/**
 * Resolve a command to an executable path, searching PATH (and PATHEXT on
 * Windows) when the command has no directory component.
 *
 * @returns the resolved path, or null when nothing executable matches
 */
export function resolveExecutable(
  command: string,
  env: Env = process.env,
  platform: Platform = process.platform,
  files: FileChecks = defaultFileChecks
): string | null {
  if (!command) return null;

  const pathApi = platform === "win32" ? path.win32 : path.posix;
  const extensions =
    platform === "win32" && !pathApi.extname(command)
      ? ["", ...(envLookup(env, "PATHEXT", platform) ?? DEFAULT_PATHEXT).split(";").filter(Boolean)]
      : [""];

  const tryCandidates = (base: string): string | null => {
    for (const ext of extensions) {
      const candidate = base + ext;
      if (files.isExecutableFile(candidate)) return candidate;
    }
    return null;
  };

  const hasDirectory = command.includes("/") || (platform === "win32" && command.includes("\\"));
  if (hasDirectory) {
    return tryCandidates(command);
  }

  const searchPath = envLookup(env, "PATH", platform) ?? "";
  for (const dir of searchPath.split(pathApi.delimiter)) {
    if (!dir) continue;
    const found = tryCandidates(pathApi.join(dir, command));
    if (found) return found;
  }

  return null;
}
