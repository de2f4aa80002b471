import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { SessionRegistry } from "../session/registry.js";
import type { Logger } from "../types.js";
import { METADATA_FILE, type SessionMetadataStore } from "./metadata.js";

export type MapperRegistry = Pick<SessionRegistry, "get" | "hasAlias" | "isAliased" | "registerAlias" | "running">;

export type SessionMapperOptions = {
  registry: MapperRegistry;
  metadata: SessionMetadataStore;
  logger: Logger;
  intervalMs?: number;
  /** Only sessions created this recently are candidates for a binding. */
  recentWindowMs?: number;
  /** Watch the metadata directory for new sessions between polls. */
  watch?: boolean;
  now?: () => number;
};

const DEFAULT_INTERVAL_MS = 2000;
const DEFAULT_RECENT_WINDOW_MS = 10_000;
const MAPPED_SOURCE = "web";

/**
 * Best-effort binding of logical sessions (written to disk by an agent that
 * was started from the web UI) to the PTY session that launched it.
 *
 * Polls the metadata directory; for every web-sourced logical id that does
 * not resolve yet, aliases it to the newest recent running session nobody
 * has aliased. Existing aliases are never touched.
 */
export class SessionMapper {
  private readonly registry: MapperRegistry;
  private readonly metadata: SessionMetadataStore;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly recentWindowMs: number;
  private readonly watchEnabled: boolean;
  private readonly now: () => number;
  private readonly known = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private watcher: FSWatcher | null = null;
  private inflight: Promise<void> | null = null;
  private rescan = false;
  private stopped = true;

  constructor(opts: SessionMapperOptions) {
    this.registry = opts.registry;
    this.metadata = opts.metadata;
    this.logger = opts.logger;
    this.intervalMs = opts.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.recentWindowMs = opts.recentWindowMs ?? DEFAULT_RECENT_WINDOW_MS;
    this.watchEnabled = opts.watch ?? true;
    this.now = opts.now ?? Date.now;
  }

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.timer = setInterval(() => this.trigger(), this.intervalMs);
    if (this.watchEnabled) {
      this.watcher = chokidar.watch(this.metadata.dir, { ignoreInitial: true, depth: 1 });
      this.watcher.on("add", (file) => {
        if (path.basename(file) === METADATA_FILE) this.trigger();
      });
      this.watcher.on("error", (err) => {
        this.logger.warn({ dir: this.metadata.dir, err: errorMessage(err) }, "session metadata watcher error");
      });
    }
    this.trigger();
    this.logger.info({ dir: this.metadata.dir, intervalMs: this.intervalMs }, "session mapper started");
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
    await this.inflight;
    this.logger.info({}, "session mapper stopped");
  }

  /**
   * One reconciliation pass. Returns the logical ids bound during this pass.
   */
  async scanOnce(): Promise<string[]> {
    const bound: string[] = [];
    const ids = await this.metadata.list();
    const present = new Set(ids);
    for (const id of this.known) {
      if (!present.has(id)) this.known.delete(id);
    }
    for (const id of ids) {
      if (this.known.has(id)) continue;
      const meta = await this.metadata.read(id);
      // Half-written metadata is retried on the next pass.
      if (!meta) continue;
      if (meta.source !== MAPPED_SOURCE) {
        this.known.add(id);
        continue;
      }
      if (this.registry.hasAlias(id) || this.registry.get(id)) {
        this.known.add(id);
        continue;
      }
      const candidate = this.pickCandidate();
      if (!candidate) continue;
      this.registry.registerAlias(id, candidate);
      this.known.add(id);
      bound.push(id);
      this.logger.info({ logicalId: id, sessionId: candidate }, "mapped logical session to pty");
    }
    return bound;
  }

  private pickCandidate(): string | null {
    const cutoff = this.now() - this.recentWindowMs;
    for (const session of this.registry.running()) {
      if (session.createdAt < cutoff) continue;
      if (this.registry.isAliased(session.id)) continue;
      return session.id;
    }
    return null;
  }

  private trigger(): void {
    if (this.stopped) return;
    if (this.inflight) {
      this.rescan = true;
      return;
    }
    this.inflight = this.scanOnce()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error({ err: errorMessage(err) }, "session mapper scan failed");
      })
      .finally(() => {
        this.inflight = null;
        if (this.rescan) {
          this.rescan = false;
          this.trigger();
        }
      });
  }
}
