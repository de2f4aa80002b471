import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { SpawnError, WorkingDirectoryMissingError } from "../errors.js";

export const TERMINAL_ENV: Readonly<Record<string, string>> = {
  TERM: "xterm-256color",
  COLORTERM: "truecolor",
  FORCE_COLOR: "1",
};

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const st = await fs.stat(candidate);
    if (!st.isFile()) return false;
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve `file` the way execvp would: paths containing a slash are taken
 * relative to `cwd`, bare names are searched on PATH.
 */
export async function resolveExecutable(file: string, opts: { cwd: string; pathEnv?: string }): Promise<string> {
  if (file.trim().length === 0) {
    throw new SpawnError(file, "Command is empty");
  }
  if (file.includes("/")) {
    const candidate = path.resolve(opts.cwd, file);
    if (await isExecutableFile(candidate)) return candidate;
    throw new SpawnError(file, `Command not found or not executable: ${file}`);
  }
  const dirs = (opts.pathEnv ?? "").split(path.delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(path.resolve(opts.cwd, dir), file);
    if (await isExecutableFile(candidate)) return candidate;
  }
  throw new SpawnError(file, `Command not found: ${file}`);
}

export async function assertWorkingDirectory(cwd: string): Promise<void> {
  try {
    const st = await fs.stat(cwd);
    if (st.isDirectory()) return;
  } catch {
    // fall through
  }
  throw new WorkingDirectoryMissingError(cwd);
}

/** Parent environment, terminal defaults, then the caller's overlay. */
export function buildSpawnEnv(overlay?: Record<string, string>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === "string") env[key] = value;
  }
  return { ...env, ...TERMINAL_ENV, ...(overlay ?? {}) };
}
