import fs from "node:fs/promises";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

/** Parsed JSON object at `target`, or null when missing or not an object. */
export async function readJsonObject(target: string): Promise<Record<string, unknown> | null> {
  let text: string;
  try {
    text = await fs.readFile(target, "utf8");
  } catch {
    return null;
  }
  try {
    const parsed = JSON.parse(text) as unknown;
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function parseJsonBody(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}
