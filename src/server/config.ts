import os from "node:os";
import path from "node:path";
import process from "node:process";
import { DEFAULT_HISTORY_BYTES } from "../session/session.js";

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw ?? "");
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const HOST = process.env.HOST ?? "127.0.0.1";
export const DEFAULT_PORT = 4830;
export const PORT = positiveInt(process.env.PORT, DEFAULT_PORT);
export const ALLOW_NON_LOOPBACK_BIND = process.env.TERMHUB_ALLOW_NON_LOOPBACK === "1";
export const LOG_LEVEL = (process.env.TERMHUB_LOG_LEVEL?.trim() || "info").toLowerCase();
export const SESSIONS_DIR = process.env.TERMHUB_SESSIONS_DIR?.trim()
  || path.join(os.homedir(), ".termhub", "sessions", "claude");
export const RESUME_COMMAND = process.env.TERMHUB_RESUME_COMMAND?.trim() || "claude";
export const SHELL = process.env.TERMHUB_SHELL ?? process.env.SHELL ?? "bash";
export const HISTORY_BYTES = positiveInt(process.env.TERMHUB_HISTORY_BYTES, DEFAULT_HISTORY_BYTES);
export const MAPPER_INTERVAL_MS = Math.max(250, positiveInt(process.env.TERMHUB_MAPPER_INTERVAL_MS, 2000));
export const MAPPER_ENABLED = process.env.TERMHUB_MAPPER !== "0";
export const WS_ALLOWED_ORIGINS = new Set(
  [
    `http://127.0.0.1:${PORT}`,
    `http://localhost:${PORT}`,
    `http://[::1]:${PORT}`,
    ...(process.env.TERMHUB_ALLOWED_ORIGINS ?? "")
      .split(",")
      .map((v) => v.trim())
      .filter((v) => v.length > 0),
  ].map((v) => v.toLowerCase()),
);

/** Environment overlay for sessions whose output should keep its colors. */
export const COLOR_ENV: Readonly<Record<string, string>> = {
  FORCE_COLOR: "1",
  CLICOLOR_FORCE: "1",
  TERM: "xterm-256color",
  COLORTERM: "truecolor",
};

export function isLoopbackHost(host: string): boolean {
  const normalized = host.trim().toLowerCase();
  return normalized === "127.0.0.1" || normalized === "localhost" || normalized === "::1";
}

export function assertLoopbackHostAllowed(): void {
  if (!ALLOW_NON_LOOPBACK_BIND && !isLoopbackHost(HOST)) {
    throw new Error(
      `Refusing to bind to non-loopback host "${HOST}". Set TERMHUB_ALLOW_NON_LOOPBACK=1 to allow.`,
    );
  }
}

export function isWsOriginAllowed(origin: string | undefined, allowed: ReadonlySet<string> = WS_ALLOWED_ORIGINS): boolean {
  if (!origin || origin.length === 0) return true;
  return allowed.has(origin.toLowerCase());
}
