/**
 * Shell and command-line helper tests
 */

import { describe, it, expect } from "vitest";
import { getDefaultShell, parseCommandLine, resolveExecutable, splitArgs, type FileChecks } from "./shell.js";
import { InvalidMessageError } from "../utils/errors.js";

/** Probe that reports only the given paths as executable. */
function filesAt(...paths: string[]): FileChecks {
  return { isExecutableFile: (candidate) => paths.includes(candidate) };
}

describe("splitArgs", () => {
  it("splits on whitespace", () => {
    expect(splitArgs("  ls   -la /tmp ")).toEqual(["ls", "-la", "/tmp"]);
  });

  it("keeps quoted words together", () => {
    expect(splitArgs(`-c "echo hi" 'a b' c\\ d`)).toEqual(["-c", "echo hi", "a b", "c d"]);
  });

  it("unescapes quotes inside double quotes only", () => {
    expect(splitArgs('"a\\"b"')).toEqual(['a"b']);
    expect(splitArgs('"a\\nb"')).toEqual(["a\\nb"]);
    expect(splitArgs("'a\\b'")).toEqual(["a\\b"]);
  });

  it("keeps an empty quoted argument", () => {
    expect(splitArgs(`cmd ""`)).toEqual(["cmd", ""]);
  });

  it("returns no arguments for blank input", () => {
    expect(splitArgs("")).toEqual([]);
    expect(splitArgs("   ")).toEqual([]);
  });

  it("rejects an unterminated quote", () => {
    expect(() => splitArgs(`echo "hi`)).toThrow(InvalidMessageError);
  });
});

describe("parseCommandLine", () => {
  it("splits a command line given without args", () => {
    expect(parseCommandLine("echo hi", undefined)).toEqual({ command: "echo", args: ["hi"] });
  });

  it("splits string args", () => {
    expect(parseCommandLine("bash", "-l -i")).toEqual({ command: "bash", args: ["-l", "-i"] });
  });

  it("leaves the command alone when args are given", () => {
    expect(parseCommandLine("my tool", ["x"])).toEqual({ command: "my tool", args: ["x"] });
  });

  it("trims a bare command", () => {
    expect(parseCommandLine(" bash ", [])).toEqual({ command: "bash", args: [] });
  });
});

describe("getDefaultShell", () => {
  it("uses COMSPEC on Windows", () => {
    expect(getDefaultShell("win32", { COMSPEC: "C:\\Windows\\system32\\cmd.exe" })).toBe(
      "C:\\Windows\\system32\\cmd.exe"
    );
  });

  it("falls back to powershell on Windows", () => {
    expect(getDefaultShell("win32", {})).toBe("powershell.exe");
  });

  it("uses SHELL on Unix", () => {
    expect(getDefaultShell("linux", { SHELL: "/usr/bin/fish" }, filesAt())).toBe("/usr/bin/fish");
  });

  it("picks the first existing fallback shell", () => {
    expect(getDefaultShell("linux", {}, filesAt("/bin/zsh", "/bin/sh"))).toBe("/bin/zsh");
  });

  it("ends at /bin/sh", () => {
    expect(getDefaultShell("darwin", {}, filesAt())).toBe("/bin/sh");
  });
});

describe("resolveExecutable", () => {
  it("searches PATH in order", () => {
    const files = filesAt("/usr/bin/sh", "/bin/sh");
    expect(resolveExecutable("sh", { PATH: "/opt/a:/usr/bin:/bin" }, "linux", files)).toBe("/usr/bin/sh");
  });

  it("checks a command with a directory directly", () => {
    expect(resolveExecutable("./run.sh", { PATH: "/usr/bin" }, "linux", filesAt("./run.sh"))).toBe("./run.sh");
    expect(resolveExecutable("/opt/missing", { PATH: "/usr/bin" }, "linux", filesAt())).toBeNull();
  });

  it("returns null when nothing matches", () => {
    expect(resolveExecutable("nope", { PATH: "/usr/bin" }, "linux", filesAt())).toBeNull();
    expect(resolveExecutable("", { PATH: "/usr/bin" }, "linux", filesAt())).toBeNull();
  });

  it("applies PATHEXT on Windows", () => {
    const env = { Path: "C:\\Windows\\System32", PATHEXT: ".COM;.EXE" };
    const files = filesAt("C:\\Windows\\System32\\cmd.EXE");
    expect(resolveExecutable("cmd", env, "win32", files)).toBe("C:\\Windows\\System32\\cmd.EXE");
  });
});
