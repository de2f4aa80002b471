import type { FastifyInstance } from "fastify";

import { SpawnError, WorkingDirectoryMissingError } from "../../errors.js";
import type { SessionRegistry } from "../../session/registry.js";
import { isRecord, optionalString, parseJsonBody } from "../../utils.js";

type TerminalRoutesDeps = {
  fastify: FastifyInstance;
  registry: SessionRegistry;
};

function parseCommand(value: unknown): string[] | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const out: string[] = [];
  for (const part of value) {
    if (typeof part !== "string") return null;
    out.push(part);
  }
  return out[0] && out[0].trim().length > 0 ? out : null;
}

function parseEnv(value: unknown): Record<string, string> | null {
  if (value == null) return {};
  if (!isRecord(value)) return null;
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") return null;
    env[k] = v;
  }
  return env;
}

function parseDimension(value: unknown): number | undefined | null {
  if (value == null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 1000) return null;
  return value;
}

export function registerTerminalRoutes(deps: TerminalRoutesDeps): void {
  const { fastify, registry } = deps;

  fastify.get("/api/terminals", async () => {
    return { sessions: registry.list() };
  });

  fastify.get<{ Params: { id: string } }>("/api/terminals/:id", async (req, reply) => {
    const session = registry.get(req.params.id);
    if (!session) {
      reply.code(404);
      return { error: "unknown terminal session" };
    }
    return session.summary(registry.aliasesOf(session.id));
  });

  fastify.post("/api/terminals", async (req, reply) => {
    const body = parseJsonBody(req.body);
    const command = parseCommand(body.command);
    if (!command) {
      reply.code(400);
      return { error: "command must be a non-empty array of strings" };
    }
    const env = parseEnv(body.env);
    if (!env) {
      reply.code(400);
      return { error: "env must be an object of strings" };
    }
    const cols = parseDimension(body.cols);
    const rows = parseDimension(body.rows);
    if (cols === null || rows === null) {
      reply.code(400);
      return { error: "cols and rows must be integers between 1 and 1000" };
    }
    const id = optionalString(body.id) ?? undefined;
    const cwd = optionalString(body.cwd) ?? undefined;

    const before = id ? registry.get(id) : undefined;
    try {
      const session = await registry.create({ id, command, cwd, env, cols, rows });
      fastify.log.info({ sessionId: session.id, command: command[0] }, "terminal created");
      return { id: session.id, pid: session.pid, reused: before === session };
    } catch (err) {
      if (err instanceof SpawnError || err instanceof WorkingDirectoryMissingError) {
        reply.code(400);
        return { error: err.message, code: err.code };
      }
      throw err;
    }
  });

  fastify.post<{ Params: { id: string } }>("/api/terminals/:id/alias", async (req, reply) => {
    const body = parseJsonBody(req.body);
    const sessionId = optionalString(body.sessionId);
    if (!sessionId) {
      reply.code(400);
      return { error: "sessionId is required" };
    }
    const target = registry.get(sessionId);
    if (!target) {
      reply.code(404);
      return { error: "unknown terminal session" };
    }
    registry.registerAlias(req.params.id, target.id);
    return { ok: true, alias: req.params.id, sessionId: target.id };
  });

  fastify.delete<{ Params: { id: string } }>("/api/terminals/:id", async (req) => {
    await registry.close(req.params.id);
    return { ok: true };
  });
}
