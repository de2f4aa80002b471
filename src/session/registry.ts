import { randomUUID } from "node:crypto";
import os from "node:os";
import { errorMessage } from "../errors.js";
import type { PtyBackend } from "../pty/channel.js";
import type { Logger, SessionId, SessionSummary } from "../types.js";
import { TerminalSession } from "./session.js";

export type CreateSessionRequest = {
  id?: SessionId;
  command: string[];
  cwd?: string;
  env?: Record<string, string>;
  cols?: number;
  rows?: number;
};

export type SessionRegistryOptions = {
  logger: Logger;
  historyBytes?: number;
  backend?: PtyBackend;
  stopTimeoutMs?: number;
};

function noop(): void {}

export function resumeSessionId(externalId: string): SessionId {
  return `resume-${externalId}`;
}

/**
 * Owns the live sessions of this process.
 *
 * Two stores: `sessions` owns, `aliases` only maps an external id (task id,
 * resume id) to a session id. Lookups try the alias first. No map mutation
 * spans an await.
 */
export class SessionRegistry {
  private readonly sessions = new Map<SessionId, TerminalSession>();
  private readonly aliases = new Map<string, SessionId>();
  private readonly starting = new Map<SessionId, Promise<TerminalSession>>();
  private readonly logger: Logger;
  private readonly opts: SessionRegistryOptions;

  constructor(opts: SessionRegistryOptions) {
    this.opts = opts;
    this.logger = opts.logger;
  }

  /**
   * Spawn a session, or return the running one already stored under `id`.
   * Concurrent calls for the same id share a single spawn.
   */
  create(req: CreateSessionRequest): Promise<TerminalSession> {
    const id = req.id ?? randomUUID();
    const existing = this.get(id);
    if (existing?.running) {
      this.logger.info({ sessionId: existing.id, via: existing.id === id ? null : id }, "reusing running session");
      return Promise.resolve(existing);
    }
    const inflight = this.starting.get(id);
    if (inflight) return inflight;

    const promise = this.spawn(id, req).finally(() => {
      this.starting.delete(id);
    });
    this.starting.set(id, promise);
    return promise;
  }

  get(id: string): TerminalSession | undefined {
    const target = this.aliases.get(id);
    if (target !== undefined) {
      const aliased = this.sessions.get(target);
      if (aliased) return aliased;
    }
    return this.sessions.get(id);
  }

  registerAlias(externalId: string, sessionId: SessionId): void {
    const prev = this.aliases.get(externalId);
    this.aliases.set(externalId, sessionId);
    if (prev !== sessionId) {
      this.logger.info({ alias: externalId, sessionId, previous: prev ?? null }, "alias registered");
    }
  }

  hasAlias(externalId: string): boolean {
    return this.aliases.has(externalId);
  }

  /** True when some alias points at `sessionId`. */
  isAliased(sessionId: SessionId): boolean {
    for (const target of this.aliases.values()) {
      if (target === sessionId) return true;
    }
    return false;
  }

  aliasesOf(sessionId: SessionId): string[] {
    const out: string[] = [];
    for (const [alias, target] of this.aliases) {
      if (target === sessionId) out.push(alias);
    }
    return out;
  }

  /**
   * Start (or re-attach to) the session that continues `externalId` and make
   * `externalId` resolve to it.
   */
  async resume(externalId: string, req: Omit<CreateSessionRequest, "id">): Promise<TerminalSession> {
    const session = await this.create({ ...req, id: resumeSessionId(externalId) });
    this.registerAlias(externalId, session.id);
    return session;
  }

  async close(id: string): Promise<void> {
    const inflight = this.starting.get(this.aliases.get(id) ?? id);
    if (inflight) {
      // A start that fails leaves nothing to close; its caller sees the error.
      await inflight.then(noop, noop);
    }
    const target = this.aliases.get(id) ?? id;
    const session = this.sessions.get(target);
    this.aliases.delete(id);
    if (!session) return;

    this.sessions.delete(target);
    for (const alias of this.aliasesOf(target)) {
      this.aliases.delete(alias);
    }
    await session.stop();
    this.logger.info({ sessionId: target, via: id === target ? null : id }, "session closed");
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()]
      .map((s) => s.summary(this.aliasesOf(s.id)))
      .sort((a, b) => b.createdAt - a.createdAt);
  }

  /** Running sessions, newest first. */
  running(): TerminalSession[] {
    return [...this.sessions.values()]
      .filter((s) => s.running)
      .sort((a, b) => b.createdAt - a.createdAt);
  }

  /** Stop every session, including ones still starting when this is called. */
  async closeAll(): Promise<void> {
    for (;;) {
      const inflight = [...this.starting.values()];
      const all = [...this.sessions.values()];
      if (inflight.length === 0 && all.length === 0) return;
      this.sessions.clear();
      this.aliases.clear();
      await Promise.all([...all.map((s) => s.stop()), ...inflight.map((p) => p.then(noop, noop))]);
    }
  }

  private async spawn(id: SessionId, req: CreateSessionRequest): Promise<TerminalSession> {
    const session = new TerminalSession({
      id,
      command: req.command,
      cwd: req.cwd ?? os.homedir(),
      env: req.env,
      cols: req.cols,
      rows: req.rows,
      historyBytes: this.opts.historyBytes,
      backend: this.opts.backend,
      stopTimeoutMs: this.opts.stopTimeoutMs,
      logger: this.logger,
    });
    try {
      await session.start();
    } catch (err) {
      this.logger.warn({ sessionId: id, command: req.command[0] ?? null, err: errorMessage(err) }, "session failed to start");
      throw err;
    }

    const replaced = this.sessions.get(id);
    this.sessions.set(id, session);
    const stale = this.aliases.get(id);
    if (stale !== undefined && stale !== id) {
      // The alias pointed at a session that is no longer running.
      this.aliases.delete(id);
      this.logger.info({ alias: id, sessionId: stale }, "alias superseded by new session");
    }
    if (replaced && replaced !== session) {
      // An ended session under the same id is superseded.
      void replaced.stop();
    }
    return session;
  }
}
