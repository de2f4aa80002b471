import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { SessionMetadataStore, isSafeId } from "../src/mapper/metadata.js";

async function writeMetadata(dir: string, id: string, body: unknown): Promise<void> {
  await fs.mkdir(path.join(dir, id), { recursive: true });
  const text = typeof body === "string" ? body : JSON.stringify(body);
  await fs.writeFile(path.join(dir, id, "metadata.json"), text, "utf8");
}

describe("SessionMetadataStore", () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "termhub-meta-"));
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  test("lists session directories sorted and ignores plain files", async () => {
    await writeMetadata(tmpRoot, "b-session", { source: "web" });
    await writeMetadata(tmpRoot, "a-session", { source: "cli" });
    await fs.writeFile(path.join(tmpRoot, "stray.txt"), "x", "utf8");
    const store = new SessionMetadataStore(tmpRoot);
    expect(await store.list()).toEqual(["a-session", "b-session"]);
  });

  test("a missing directory lists as empty", async () => {
    const store = new SessionMetadataStore(path.join(tmpRoot, "nope"));
    expect(await store.list()).toEqual([]);
  });

  test("reads snake_case fields and converts second timestamps", async () => {
    await writeMetadata(tmpRoot, "conv-1", {
      source: "web",
      project_path: "/work/alpha",
      started_at: 1_700_000_000,
      status: "active",
    });
    const store = new SessionMetadataStore(tmpRoot);
    expect(await store.read("conv-1")).toEqual({
      id: "conv-1",
      source: "web",
      projectPath: "/work/alpha",
      startedAt: 1_700_000_000_000,
      status: "active",
    });
  });

  test("reads camelCase fields and ISO timestamps", async () => {
    await writeMetadata(tmpRoot, "conv-2", {
      source: "cli",
      projectPath: "/work/beta",
      startedAt: "2024-01-02T03:04:05.000Z",
    });
    const store = new SessionMetadataStore(tmpRoot);
    expect(await store.read("conv-2")).toEqual({
      id: "conv-2",
      source: "cli",
      projectPath: "/work/beta",
      startedAt: Date.parse("2024-01-02T03:04:05.000Z"),
      status: null,
    });
  });

  test("missing, malformed and non-object metadata read as null", async () => {
    await writeMetadata(tmpRoot, "broken", "{not json");
    await writeMetadata(tmpRoot, "array", [1, 2]);
    const store = new SessionMetadataStore(tmpRoot);
    expect(await store.read("absent")).toBeNull();
    expect(await store.read("broken")).toBeNull();
    expect(await store.read("array")).toBeNull();
  });

  test("unsafe ids are rejected without touching the disk", async () => {
    const store = new SessionMetadataStore(tmpRoot);
    expect(await store.read("../etc")).toBeNull();
    expect(await store.read("..")).toBeNull();
  });
});

describe("isSafeId", () => {
  test("accepts ordinary ids and rejects path tricks", () => {
    expect(isSafeId("3f2a-conv")).toBe(true);
    expect(isSafeId("")).toBe(false);
    expect(isSafeId(".")).toBe(false);
    expect(isSafeId("a/b")).toBe(false);
    expect(isSafeId("a\\b")).toBe(false);
    expect(isSafeId("x".repeat(201))).toBe(false);
  });
});
