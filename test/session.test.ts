import os from "node:os";
import { describe, expect, test } from "vitest";
import { SubscriptionClosedError } from "../src/errors.js";
import { TerminalSession } from "../src/session/session.js";
import type { Subscription } from "../src/session/subscription.js";
import { FakeBackend, testLogger, waitFor } from "./helpers/fake-pty.js";

async function startSession(opts?: { historyBytes?: number }) {
  const backend = new FakeBackend();
  const logger = testLogger();
  const session = new TerminalSession({
    id: "sess-1",
    command: ["sh"],
    cwd: os.tmpdir(),
    backend,
    logger,
    historyBytes: opts?.historyBytes,
  });
  await session.start();
  return { session, backend, proc: backend.last(), logger };
}

async function readBytes(sub: Subscription, count: number): Promise<string> {
  let out = "";
  while (Buffer.byteLength(out) < count) {
    const evt = await sub.next(2000);
    if (!evt) throw new Error("timed out waiting for output");
    if (evt.type === "end") throw new Error("unexpected end");
    out += evt.data.toString();
  }
  return out;
}

describe("TerminalSession", () => {
  test("moves created -> running -> ended", async () => {
    const backend = new FakeBackend();
    const session = new TerminalSession({ id: "s", command: ["sh"], cwd: os.tmpdir(), backend, logger: testLogger() });
    expect(session.status).toBe("created");
    expect(session.pid).toBeNull();
    await session.start();
    expect(session.status).toBe("running");
    expect(session.pid).toBe(backend.last().pid);
    backend.last().emitExit(0);
    await waitFor(() => session.status === "ended");
    await expect(session.start()).rejects.toThrow("Session s was already started");
  });

  test("subscriber sees no-data, then output, then exactly one end marker", async () => {
    const { session, proc } = await startSession();
    const sub = session.subscribe();

    expect(await sub.next(20)).toBeNull();

    proc.emitData("Hello World\r\n");
    const out = await sub.next(2000);
    expect(out?.type).toBe("output");
    expect(out?.type === "output" ? out.data.toString() : null).toBe("Hello World\r\n");

    proc.emitExit(0);
    expect(await sub.next(2000)).toEqual({ type: "end" });
    await expect(sub.next(20)).rejects.toBeInstanceOf(SubscriptionClosedError);
  });

  test("emits end with the exit status once", async () => {
    const { session, proc } = await startSession();
    const exits: unknown[] = [];
    session.on("end", (exit) => exits.push(exit));
    proc.emitExit(3);
    await waitFor(() => exits.length > 0);
    await session.stop();
    expect(exits).toEqual([{ exitCode: 3, signal: null }]);
    expect(session.summary().exitCode).toBe(3);
  });

  test("history plus live stream reproduces the full output", async () => {
    const { session, proc } = await startSession();
    proc.emitData("one ");
    proc.emitData("two ");
    await waitFor(() => session.history().length === 8);

    const sub = session.subscribe();
    const history = session.history().toString();
    expect(history).toBe("one two ");

    proc.emitData("three");
    const live = await readBytes(sub, 5);
    expect(history + live).toBe("one two three");
  });

  test("history never exceeds the capacity and keeps the newest bytes", async () => {
    const { session, proc } = await startSession();
    let last = "";
    for (let i = 0; i < 150; i += 1) {
      last = String.fromCharCode(97 + (i % 26)).repeat(1000);
      proc.emitData(last);
    }
    await waitFor(() => session.history().subarray(-1000).toString() === last);
    const history = session.history();
    expect(history.length).toBe(100_000);
    expect(history.subarray(0, 1000).toString()).toBe(String.fromCharCode(97 + (50 % 26)).repeat(1000));
  });

  test("honours a custom history size", async () => {
    const { session, proc } = await startSession({ historyBytes: 4 });
    proc.emitData("abcdef");
    await waitFor(() => session.history().toString() === "cdef");
    expect(session.summary().historyBytes).toBe(4);
  });

  test("fans output out to every subscriber in order", async () => {
    const { session, proc } = await startSession();
    const a = session.subscribe();
    const b = session.subscribe();

    proc.emitData("x");
    proc.emitData("y");
    expect(await readBytes(a, 2)).toBe("xy");
    expect(await readBytes(b, 2)).toBe("xy");

    session.unsubscribe(a);
    proc.emitData("z");
    expect(await readBytes(b, 1)).toBe("z");
    await expect(a.next(10)).rejects.toBeInstanceOf(SubscriptionClosedError);
    expect(session.summary().subscribers).toBe(1);
  });

  test("unsubscribe is safe to repeat and after the session ended", async () => {
    const { session, proc } = await startSession();
    const sub = session.subscribe();
    session.unsubscribe(sub);
    session.unsubscribe(sub);
    proc.emitExit(0);
    await waitFor(() => session.status === "ended");
    session.unsubscribe(sub);
    expect(sub.closed).toBe(true);
  });

  test("a slow subscriber does not hold back a fast one", async () => {
    const { session, proc } = await startSession();
    const slow = session.subscribe();
    const fast = session.subscribe();
    for (let i = 0; i < 10; i += 1) proc.emitData(`${i}`);
    expect(await readBytes(fast, 10)).toBe("0123456789");
    expect(slow.backlog).toBe(10);
  });

  test("subscribing after the end yields the end marker immediately", async () => {
    const { session, proc } = await startSession();
    proc.emitData("bye\r\n");
    proc.emitExit(0);
    await waitFor(() => session.status === "ended");

    const late = session.subscribe();
    expect(session.history().toString()).toBe("bye\r\n");
    expect(await late.next(10)).toEqual({ type: "end" });
  });

  test("forwards input and resize, and ignores both once ended", async () => {
    const { session, proc } = await startSession();
    session.write("ls\r");
    session.resize(40, 132);
    expect(proc.written).toEqual(["ls\r"]);
    expect(proc.resizes).toEqual([{ cols: 132, rows: 40 }]);

    await session.stop();
    session.write("pwd\r");
    session.resize(10, 10);
    expect(proc.written).toEqual(["ls\r"]);
    expect(proc.resizes).toHaveLength(1);
  });

  test("logs a failed resize and keeps running", async () => {
    const { session, proc, logger } = await startSession();
    proc.failResize = true;
    session.resize(24, 80);
    expect(session.running).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      { sessionId: "sess-1", rows: 24, cols: 80, err: "ioctl(2) failed, EBADF" },
      "resize failed",
    );
  });

  test("stop kills the child, ends subscribers and is idempotent", async () => {
    const { session, backend, proc } = await startSession();
    const sub = session.subscribe();

    await session.stop();
    expect(proc.exited).toBe(true);
    expect(backend.groupKills).toHaveLength(1);
    expect(session.status).toBe("ended");
    expect(await sub.next(10)).toEqual({ type: "end" });

    await session.stop();
    expect(backend.groupKills).toHaveLength(1);
  });

  test("stop during start kills the child and never reports running", async () => {
    const backend = new FakeBackend();
    const session = new TerminalSession({ id: "s", command: ["sh"], cwd: os.tmpdir(), backend, logger: testLogger() });
    let ends = 0;
    session.on("end", () => {
      ends += 1;
    });

    const starting = session.start();
    await session.stop();
    await starting;

    expect(session.status).toBe("ended");
    expect(ends).toBe(1);
    expect(backend.spawned).toHaveLength(1);
    expect(backend.groupKills).toHaveLength(1);
    expect(backend.last().exited).toBe(true);
    expect(session.exit).toEqual({ exitCode: 0, signal: "SIGKILL" });
  });

  test("summary previews the last line without escape sequences", async () => {
    const { session, proc } = await startSession();
    proc.emitData("starting\r\n\x1b[32mready\x1b[0m\r\n");
    await waitFor(() => session.history().length > 0);
    const summary = session.summary(["task-1"]);
    expect(summary.preview).toBe("ready");
    expect(summary.aliases).toEqual(["task-1"]);
    expect(summary.command).toEqual(["sh"]);
    expect(summary.status).toBe("running");
  });
});
