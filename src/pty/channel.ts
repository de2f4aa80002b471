import os from "node:os";
import * as pty from "node-pty";
import type { IEvent, IPtyForkOptions } from "node-pty";
import { ResizeFailedError, SpawnError, errorMessage } from "../errors.js";
import { assertWorkingDirectory, buildSpawnEnv, resolveExecutable } from "./spawn.js";

export type ReadResult = { type: "data"; data: Buffer } | { type: "idle" } | { type: "eof" };

export type PtyExit = { exitCode: number | null; signal: string | null };

/** The subset of node-pty's IPty the channel drives. */
export type PtyProcess = {
  readonly pid: number;
  readonly onData: IEvent<string>;
  readonly onExit: IEvent<{ exitCode: number; signal?: number }>;
  write(data: string): void;
  resize(columns: number, rows: number): void;
  kill(signal?: string): void;
};

export type PtyBackend = {
  spawn(file: string, args: string[], options: IPtyForkOptions): PtyProcess;
  /** Signal the whole process group led by `pid`. */
  killGroup(pid: number, signal: NodeJS.Signals): void;
};

export const nodePtyBackend: PtyBackend = {
  spawn: (file, args, options) => pty.spawn(file, args, options),
  killGroup: (pid, signal) => {
    // node-pty makes the child a session leader, so its pgid is its pid.
    process.kill(-pid, signal);
  },
};

export type PtyChannelOptions = {
  command: string[];
  cwd: string;
  env?: Record<string, string>;
  cols?: number;
  rows?: number;
  backend?: PtyBackend;
  /** How long stop() waits for the exit to be observed. */
  stopTimeoutMs?: number;
};

const DEFAULT_COLS = 120;
const DEFAULT_ROWS = 30;
const DEFAULT_STOP_TIMEOUT_MS = 2000;

function signalName(signal: number | undefined): string | null {
  if (!signal) return null;
  for (const [name, num] of Object.entries(os.constants.signals)) {
    if (num === signal) return name;
  }
  return String(signal);
}

function isNoSuchProcess(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ESRCH";
}

/**
 * One child process attached to one pseudo-terminal.
 *
 * Output is buffered in arrival order until read() pulls it. read()
 * distinguishes "nothing arrived in the window" (`idle`) from "the child is
 * gone and every byte has been handed out" (`eof`).
 */
export class PtyChannel {
  readonly pid: number;
  readonly cwd: string;
  readonly env: Record<string, string>;

  private readonly proc: PtyProcess;
  private readonly backend: PtyBackend;
  private readonly stopTimeoutMs: number;
  private readonly pending: Buffer[] = [];
  private readonly waiters = new Set<() => void>();
  private readonly exited: Promise<PtyExit>;
  private exitInfo: PtyExit | null = null;
  private closed = false;
  private stopping: Promise<void> | null = null;

  private constructor(proc: PtyProcess, opts: { cwd: string; env: Record<string, string>; backend: PtyBackend; stopTimeoutMs: number }) {
    this.proc = proc;
    this.pid = proc.pid;
    this.cwd = opts.cwd;
    this.env = opts.env;
    this.backend = opts.backend;
    this.stopTimeoutMs = opts.stopTimeoutMs;

    proc.onData((data) => {
      if (this.closed || data.length === 0) return;
      this.pending.push(Buffer.from(data, "utf8"));
      this.wake();
    });

    this.exited = new Promise<PtyExit>((resolve) => {
      proc.onExit(({ exitCode, signal }) => {
        this.exitInfo = { exitCode, signal: signalName(signal) };
        this.closed = true;
        this.wake();
        resolve(this.exitInfo);
      });
    });
  }

  /**
   * Validate the working directory, locate the executable and spawn it under
   * a new PTY.
   */
  static async start(opts: PtyChannelOptions): Promise<PtyChannel> {
    const [file, ...args] = opts.command;
    if (file === undefined) {
      throw new SpawnError("", "Command is empty");
    }
    await assertWorkingDirectory(opts.cwd);
    const env = buildSpawnEnv(opts.env);
    const executable = await resolveExecutable(file, { cwd: opts.cwd, pathEnv: env.PATH });
    const backend = opts.backend ?? nodePtyBackend;

    let proc: PtyProcess;
    try {
      proc = backend.spawn(executable, args, {
        name: "xterm-256color",
        cols: opts.cols ?? DEFAULT_COLS,
        rows: opts.rows ?? DEFAULT_ROWS,
        cwd: opts.cwd,
        env,
      });
    } catch (err) {
      throw new SpawnError(file, `Failed to spawn ${file}: ${errorMessage(err)}`, { cause: err });
    }

    return new PtyChannel(proc, {
      cwd: opts.cwd,
      env,
      backend,
      stopTimeoutMs: opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS,
    });
  }

  get alive(): boolean {
    return !this.closed;
  }

  get exit(): PtyExit | null {
    return this.exitInfo;
  }

  async read(maxBytes: number, timeoutMs: number): Promise<ReadResult> {
    if (this.pending.length === 0 && !this.closed) {
      await this.waitForActivity(timeoutMs);
    }
    if (this.pending.length > 0) {
      return { type: "data", data: this.take(maxBytes) };
    }
    return this.closed ? { type: "eof" } : { type: "idle" };
  }

  write(data: string): void {
    if (this.closed) return;
    this.proc.write(data);
  }

  resize(rows: number, cols: number): void {
    if (this.closed) return;
    try {
      this.proc.resize(cols, rows);
    } catch (err) {
      throw new ResizeFailedError(rows, cols, { cause: err });
    }
  }

  /** Kill the process group and wait until the exit has been observed. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.doStop();
    return this.stopping;
  }

  private async doStop(): Promise<void> {
    if (!this.exitInfo) {
      try {
        this.backend.killGroup(this.pid, "SIGKILL");
      } catch (err) {
        if (!isNoSuchProcess(err)) {
          try {
            this.proc.kill("SIGKILL");
          } catch {
            // already exited
          }
        }
      }
      let timer: NodeJS.Timeout | undefined;
      const observed = await Promise.race([
        this.exited.then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
        }),
      ]);
      clearTimeout(timer);
      if (!observed) {
        // Exit never reported: release the master side ourselves.
        try {
          this.proc.kill();
        } catch {
          // master already torn down
        }
      }
    }
    this.closed = true;
    this.pending.length = 0;
    this.wake();
  }

  private take(maxBytes: number): Buffer {
    const out: Buffer[] = [];
    let remaining = Math.max(1, maxBytes);
    while (remaining > 0 && this.pending.length > 0) {
      const head = this.pending[0];
      if (!head) break;
      if (head.length <= remaining) {
        out.push(head);
        this.pending.shift();
        remaining -= head.length;
      } else {
        out.push(head.subarray(0, remaining));
        this.pending[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    return out.length === 1 && out[0] ? out[0] : Buffer.concat(out);
  }

  private waitForActivity(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.add(done);
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
