/**
 * Stand-in for the node-pty module, loaded through
 * `vi.mock("node-pty", () => import("../test-utils/fake-pty.js"))`.
 *
 * Every spawned FakePty is recorded in `spawned`; tests drive output and
 * exit by hand.
 */

export interface FakePtyOptions {
  name?: string;
  cols: number;
  rows: number;
  cwd?: string;
  env?: Record<string, string>;
  encoding?: string | null;
  useConpty?: boolean;
}

interface ExitEvent {
  exitCode: number;
  signal?: number;
}

export class FakePty {
  cols: number;
  rows: number;
  readonly written: string[] = [];
  readonly killSignals: Array<string | undefined> = [];
  pauseCalls = 0;
  resumeCalls = 0;
  /** When set, kill() makes the process exit with this code */
  exitOnKill: number | null = null;
  private dataListeners = new Set<(data: string) => void>();
  private exitListeners = new Set<(event: ExitEvent) => void>();

  constructor(
    readonly pid: number,
    readonly file: string,
    readonly args: string[] | string,
    readonly options: FakePtyOptions
  ) {
    this.cols = options.cols;
    this.rows = options.rows;
  }

  onData(listener: (data: string) => void): { dispose: () => void } {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (event: ExitEvent) => void): { dispose: () => void } {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  write(data: string): void {
    this.written.push(data);
  }

  resize(cols: number, rows: number): void {
    this.cols = cols;
    this.rows = rows;
  }

  pause(): void {
    this.pauseCalls++;
  }

  resume(): void {
    this.resumeCalls++;
  }

  kill(signal?: string): void {
    this.killSignals.push(signal);
    if (this.exitOnKill !== null) {
      this.emitExit(this.exitOnKill);
    }
  }

  emitData(data: string): void {
    for (const listener of this.dataListeners) listener(data);
  }

  emitExit(exitCode: number): void {
    for (const listener of this.exitListeners) listener({ exitCode });
  }
}

export const spawned: FakePty[] = [];

export function spawn(file: string, args: string[] | string, options: FakePtyOptions): FakePty {
  if (file.includes("explode")) {
    throw new Error("posix_spawnp failed.");
  }
  const proc = new FakePty(4242 + spawned.length, file, args, options);
  spawned.push(proc);
  return proc;
}
