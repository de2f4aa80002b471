#!/usr/bin/env node
import Fastify from "fastify";
import process from "node:process";

import { SessionMetadataStore } from "./mapper/metadata.js";
import { SessionMapper } from "./mapper/session-mapper.js";
import {
  HISTORY_BYTES,
  HOST,
  LOG_LEVEL,
  MAPPER_ENABLED,
  MAPPER_INTERVAL_MS,
  PORT,
  RESUME_COMMAND,
  SESSIONS_DIR,
  SHELL,
  assertLoopbackHostAllowed,
} from "./server/config.js";
import { registerTerminalRoutes } from "./server/routes/terminals.js";
import { registerTerminalWs } from "./server/ws.js";
import { SessionRegistry } from "./session/registry.js";

assertLoopbackHostAllowed();

const fastify = Fastify({ logger: { level: LOG_LEVEL }, disableRequestLogging: true });

const registry = new SessionRegistry({ logger: fastify.log, historyBytes: HISTORY_BYTES });
const metadata = new SessionMetadataStore(SESSIONS_DIR);
const mapper = new SessionMapper({
  registry,
  metadata,
  logger: fastify.log,
  intervalMs: MAPPER_INTERVAL_MS,
});

registerTerminalRoutes({ fastify, registry });
registerTerminalWs({ fastify, registry, metadata, resumeCommand: RESUME_COMMAND, shell: SHELL });

fastify.addHook("onClose", async () => {
  await mapper.stop();
  await registry.closeAll();
});

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  fastify.log.info({ signal }, "shutting down");
  try {
    await fastify.close();
  } catch (err) {
    fastify.log.error({ err }, "shutdown failed");
    process.exitCode = 1;
  }
}

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));

if (MAPPER_ENABLED) mapper.start();

await fastify.listen({ host: HOST, port: PORT });
fastify.log.info(`termhub ready at http://${HOST}:${PORT}`);
