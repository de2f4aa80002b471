import type { FastifyBaseLogger } from "fastify";

export type SessionId = string;

export type SessionStatus = "created" | "running" | "ended";

export type SessionSummary = {
  id: SessionId;
  command: string[];
  cwd: string;
  pid: number | null;
  status: SessionStatus;
  createdAt: number;
  endedAt: number | null;
  exitCode: number | null;
  exitSignal: string | null;
  subscribers: number;
  historyBytes: number;
  aliases: string[];
  preview: string | null;
};

export type SessionEvent = { type: "output"; data: Buffer } | { type: "end" };

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export type ClientToServerMessage =
  | { type: "input"; data: string }
  | { type: "resize"; rows: number; cols: number };

export type ServerControlMessage =
  | { type: "exit"; code: number | null; signal: string | null }
  | { type: "error"; message: string };
