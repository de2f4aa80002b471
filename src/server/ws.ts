import { WebSocketServer } from "ws";
import type WebSocket from "ws";
import type { FastifyInstance } from "fastify";

import { errorMessage } from "../errors.js";
import { isSafeId, type SessionMetadataStore } from "../mapper/metadata.js";
import type { SessionRegistry } from "../session/registry.js";
import type { TerminalSession } from "../session/session.js";
import type { Subscription } from "../session/subscription.js";
import type { ClientToServerMessage, ServerControlMessage } from "../types.js";
import { COLOR_ENV, isWsOriginAllowed } from "./config.js";
import { isRecord } from "../utils.js";

type TerminalWsDeps = {
  fastify: FastifyInstance;
  registry: SessionRegistry;
  metadata: SessionMetadataStore;
  resumeCommand: string;
  shell: string;
  allowedOrigins?: ReadonlySet<string>;
  maxBufferedAmount?: number;
};

const PATH_PREFIX = "/terminal/";
const MAX_MESSAGE_BYTES = 256 * 1024;
const MAX_INPUT_BYTES = 64 * 1024;

function sendControl(ws: WebSocket, msg: ServerControlMessage): void {
  ws.send(JSON.stringify(msg));
}

export function parseClientMessage(raw: unknown): ClientToServerMessage | null {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else if (Buffer.isBuffer(raw)) {
    text = raw.toString("utf8");
  } else if (Array.isArray(raw) && raw.every(Buffer.isBuffer)) {
    text = Buffer.concat(raw).toString("utf8");
  } else if (raw instanceof ArrayBuffer) {
    text = Buffer.from(raw).toString("utf8");
  } else {
    return null;
  }

  if (Buffer.byteLength(text, "utf8") > MAX_MESSAGE_BYTES) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  if (parsed.type === "input") {
    if (typeof parsed.data !== "string") return null;
    if (Buffer.byteLength(parsed.data, "utf8") > MAX_INPUT_BYTES) return null;
    return { type: "input", data: parsed.data };
  }
  if (parsed.type === "resize") {
    const rows = parsed.rows;
    const cols = parsed.cols;
    if (typeof cols !== "number" || typeof rows !== "number") return null;
    if (!Number.isInteger(cols) || !Number.isInteger(rows)) return null;
    if (cols < 1 || cols > 1000) return null;
    if (rows < 1 || rows > 1000) return null;
    return { type: "resize", rows, cols };
  }
  return null;
}

/** `/terminal/<id>` -> id, or null for any other path. */
export function terminalIdFromPath(pathname: string): string | null {
  if (!pathname.startsWith(PATH_PREFIX)) return null;
  const rest = pathname.slice(PATH_PREFIX.length);
  if (rest.includes("/")) return null;
  let id: string;
  try {
    id = decodeURIComponent(rest);
  } catch {
    return null;
  }
  return isSafeId(id) ? id : null;
}

export function registerTerminalWs(deps: TerminalWsDeps): void {
  const { fastify, registry, metadata, resumeCommand, shell } = deps;
  const maxBufferedAmount = deps.maxBufferedAmount ?? 8 * 1024 * 1024;
  const wss = new WebSocketServer({ noServer: true });

  /**
   * A running session under `id`; otherwise a resumed conversation when
   * metadata exists for it, otherwise a fresh shell aliased to `id`.
   */
  async function resolveSession(id: string): Promise<TerminalSession> {
    const live = registry.get(id);
    if (live?.running) return live;

    const meta = await metadata.read(id);
    if (meta) {
      fastify.log.info({ sessionId: id, cwd: meta.projectPath }, "resuming logical session");
      return registry.resume(id, {
        command: [resumeCommand, "--resume", id],
        cwd: meta.projectPath ?? undefined,
        env: { ...COLOR_ENV },
      });
    }
    if (live) return live;

    const created = await registry.create({ id: `shell-${id}`, command: [shell], env: { ...COLOR_ENV } });
    registry.registerAlias(id, created.id);
    return created;
  }

  async function pump(ws: WebSocket, session: TerminalSession, sub: Subscription): Promise<void> {
    while (!sub.closed) {
      const evt = await sub.next();
      if (!evt) return;
      if (ws.readyState !== ws.OPEN) return;
      if (evt.type === "end") {
        const { exitCode, signal } = session.exit;
        sendControl(ws, { type: "exit", code: exitCode, signal });
        ws.close(1000, "Session ended");
        return;
      }
      if (ws.bufferedAmount > maxBufferedAmount) {
        fastify.log.warn({ sessionId: session.id }, "closing slow terminal client");
        ws.close(1011, "Client too slow");
        return;
      }
      ws.send(evt.data, { binary: true });
    }
  }

  function onConnection(ws: WebSocket, id: string): void {
    let session: TerminalSession | null = null;
    let sub: Subscription | null = null;
    const early: ClientToServerMessage[] = [];

    const handle = (msg: ClientToServerMessage, target: TerminalSession) => {
      if (msg.type === "input") {
        target.write(msg.data);
        return;
      }
      target.resize(msg.rows, msg.cols);
    };

    ws.on("message", (raw) => {
      const msg = parseClientMessage(raw);
      if (!msg) return;
      if (session) handle(msg, session);
      else early.push(msg);
    });

    ws.on("close", () => {
      if (session && sub) session.unsubscribe(sub);
      fastify.log.info({ sessionId: id }, "terminal client disconnected");
    });

    void resolveSession(id)
      .then((resolved) => {
        if (ws.readyState !== ws.OPEN) return;
        session = resolved;
        // Subscribe before the snapshot: a boundary chunk may repeat, none is lost.
        sub = resolved.subscribe();
        const history = resolved.history();
        if (history.length > 0) ws.send(history, { binary: true });
        for (const msg of early.splice(0)) handle(msg, resolved);
        fastify.log.info({ sessionId: id, target: resolved.id }, "terminal client connected");
        return pump(ws, resolved, sub);
      })
      .catch((err: unknown) => {
        fastify.log.warn({ sessionId: id, err: errorMessage(err) }, "terminal connection failed");
        if (ws.readyState !== ws.OPEN) return;
        sendControl(ws, { type: "error", message: errorMessage(err) });
        ws.close(1011, "Session unavailable");
      });
  }

  fastify.server.on("upgrade", (req, socket, head) => {
    try {
      const url = new URL(req.url ?? "", `http://${req.headers.host ?? "localhost"}`);
      const id = terminalIdFromPath(url.pathname);
      if (!id) {
        socket.destroy();
        return;
      }
      if (!isWsOriginAllowed(req.headers.origin, deps.allowedOrigins)) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => onConnection(ws, id));
    } catch {
      try {
        socket.destroy();
      } catch {
        // ignore
      }
    }
  });

  fastify.addHook("onClose", (_instance, done) => {
    for (const client of wss.clients) client.terminate();
    wss.close(() => done());
  });
}
