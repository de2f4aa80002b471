import { EventEmitter } from "node:events";
import stripAnsi from "strip-ansi";
import { ResizeFailedError, errorMessage } from "../errors.js";
import { PtyChannel, type PtyBackend, type PtyExit } from "../pty/channel.js";
import { ByteRingBuffer } from "../pty/ring-buffer.js";
import type { Logger, SessionId, SessionStatus, SessionSummary } from "../types.js";
import { Subscription } from "./subscription.js";

export const DEFAULT_HISTORY_BYTES = 100_000;
const READ_CHUNK_BYTES = 4096;
const POLL_INTERVAL_MS = 100;
const PREVIEW_TAIL_BYTES = 4096;
const PREVIEW_MAX_CHARS = 200;

export type TerminalSessionOptions = {
  id: SessionId;
  command: string[];
  cwd: string;
  env?: Record<string, string>;
  cols?: number;
  rows?: number;
  historyBytes?: number;
  backend?: PtyBackend;
  logger: Logger;
  stopTimeoutMs?: number;
};

function noop(): void {}

function previewLine(history: Buffer): string | null {
  const tail = history.subarray(Math.max(0, history.length - PREVIEW_TAIL_BYTES)).toString("utf8");
  const lines = stripAnsi(tail).split(/\r\n|\r|\n/);
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const line = lines[i]?.trim() ?? "";
    if (line.length > 0) return line.slice(0, PREVIEW_MAX_CHARS);
  }
  return null;
}

/**
 * A PTY channel plus its output history and observers.
 *
 * The drain loop is the only writer of the history and the only producer
 * into subscriptions. Lifecycle: created -> running -> ended, never back.
 */
export class TerminalSession extends EventEmitter {
  readonly id: SessionId;
  readonly command: string[];
  readonly cwd: string;
  readonly createdAt = Date.now();

  private readonly opts: TerminalSessionOptions;
  private readonly logger: Logger;
  private readonly historyBuffer: ByteRingBuffer;
  private readonly subscriptions = new Set<Subscription>();
  private channel: PtyChannel | null = null;
  private startup: Promise<void> | null = null;
  private draining: Promise<void> | null = null;
  private cancelled = false;
  private state: SessionStatus = "created";
  private endedAt: number | null = null;
  private exitInfo: PtyExit = { exitCode: null, signal: null };

  constructor(opts: TerminalSessionOptions) {
    super();
    this.opts = opts;
    this.id = opts.id;
    this.command = [...opts.command];
    this.cwd = opts.cwd;
    this.logger = opts.logger;
    this.historyBuffer = new ByteRingBuffer(opts.historyBytes ?? DEFAULT_HISTORY_BYTES);
  }

  get status(): SessionStatus {
    return this.state;
  }

  get running(): boolean {
    return this.state === "running";
  }

  get pid(): number | null {
    return this.channel?.pid ?? null;
  }

  get exit(): PtyExit {
    return { ...this.exitInfo };
  }

  async start(): Promise<void> {
    if (this.state !== "created" || this.startup) {
      throw new Error(`Session ${this.id} was already started`);
    }
    this.startup = this.open();
    return this.startup;
  }

  private async open(): Promise<void> {
    const channel = await PtyChannel.start({
      command: this.command,
      cwd: this.cwd,
      env: this.opts.env,
      cols: this.opts.cols,
      rows: this.opts.rows,
      backend: this.opts.backend,
      stopTimeoutMs: this.opts.stopTimeoutMs,
    });
    this.channel = channel;
    if (this.cancelled) {
      // stop() arrived while the child was being spawned.
      await channel.stop();
      this.finish();
      return;
    }
    this.state = "running";
    this.draining = this.drain(channel);
    this.logger.info({ sessionId: this.id, pid: channel.pid, command: this.command[0], cwd: this.cwd }, "session started");
  }

  write(text: string): void {
    if (!this.running || !this.channel) return;
    try {
      this.channel.write(text);
    } catch (err) {
      this.logger.debug({ sessionId: this.id, err: errorMessage(err) }, "write after channel closed");
    }
  }

  resize(rows: number, cols: number): void {
    if (!this.running || !this.channel) return;
    try {
      this.channel.resize(rows, cols);
    } catch (err) {
      if (!(err instanceof ResizeFailedError)) throw err;
      this.logger.warn({ sessionId: this.id, rows, cols, err: errorMessage(err.cause) }, "resize failed");
    }
  }

  /**
   * Register a new observer. Take history() after subscribing: bytes emitted
   * in between may then arrive twice, but never go missing.
   */
  subscribe(): Subscription {
    const sub = new Subscription();
    if (this.state === "ended") {
      sub.end();
      return sub;
    }
    this.subscriptions.add(sub);
    return sub;
  }

  unsubscribe(sub: Subscription): void {
    this.subscriptions.delete(sub);
    sub.detach();
  }

  history(): Buffer {
    return this.historyBuffer.snapshot();
  }

  /** Cancel the drain loop and release the child; idempotent. */
  async stop(): Promise<void> {
    this.cancelled = true;
    if (this.startup) {
      // A start that failed has no child to release; its caller sees the error.
      await this.startup.then(noop, noop);
    }
    if (this.channel) {
      await this.channel.stop();
    }
    if (this.draining) {
      await this.draining;
    }
    this.finish();
  }

  summary(aliases: string[] = []): SessionSummary {
    const history = this.historyBuffer.snapshot();
    return {
      id: this.id,
      command: [...this.command],
      cwd: this.cwd,
      pid: this.pid,
      status: this.state,
      createdAt: this.createdAt,
      endedAt: this.endedAt,
      exitCode: this.exitInfo.exitCode,
      exitSignal: this.exitInfo.signal,
      subscribers: this.subscriptions.size,
      historyBytes: history.length,
      aliases,
      preview: previewLine(history),
    };
  }

  private async drain(channel: PtyChannel): Promise<void> {
    try {
      while (!this.cancelled) {
        const res = await channel.read(READ_CHUNK_BYTES, POLL_INTERVAL_MS);
        if (res.type === "idle") continue;
        if (res.type === "eof") break;
        this.historyBuffer.append(res.data);
        for (const sub of this.subscriptions) {
          sub.push(res.data);
        }
      }
    } catch (err) {
      this.logger.error({ sessionId: this.id, err: errorMessage(err) }, "drain loop failed; treating as end of stream");
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    if (this.state === "ended") return;
    this.state = "ended";
    this.endedAt = Date.now();
    this.exitInfo = this.channel?.exit ?? { exitCode: null, signal: null };
    for (const sub of this.subscriptions) {
      sub.end();
    }
    this.logger.info(
      { sessionId: this.id, code: this.exitInfo.exitCode, signal: this.exitInfo.signal },
      "session ended",
    );
    this.emit("end", this.exit);
    // A drain loop that hit an I/O error leaves the child behind.
    if (this.channel?.alive) {
      void this.channel.stop();
    }
  }
}
