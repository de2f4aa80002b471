import fs from "node:fs/promises";
import path from "node:path";
import { optionalString, readJsonObject } from "../utils.js";

export type SessionMetadata = {
  id: string;
  source: string | null;
  projectPath: string | null;
  startedAt: number | null;
  status: string | null;
};

export const METADATA_FILE = "metadata.json";

function parseTimestamp(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    // Seconds and milliseconds both show up in the wild.
    return value < 1e12 ? Math.round(value * 1000) : value;
  }
  if (typeof value === "string" && value.trim()) {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
}

/**
 * Read-only view of the persisted logical sessions:
 * `<dir>/<sessionId>/metadata.json`.
 */
export class SessionMetadataStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  metadataPath(id: string): string {
    return path.join(this.dir, id, METADATA_FILE);
  }

  /** Logical session ids on disk; empty when the directory does not exist. */
  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    } catch {
      return [];
    }
  }

  async read(id: string): Promise<SessionMetadata | null> {
    if (!isSafeId(id)) return null;
    const raw = await readJsonObject(this.metadataPath(id));
    if (!raw) return null;
    return {
      id,
      source: optionalString(raw.source),
      projectPath: optionalString(raw.project_path) ?? optionalString(raw.projectPath),
      startedAt: parseTimestamp(raw.started_at ?? raw.startedAt),
      status: optionalString(raw.status),
    };
  }
}

export function isSafeId(id: string): boolean {
  return id.length > 0 && id.length <= 200 && id !== "." && id !== ".." && !/[\\/\0]/.test(id);
}
