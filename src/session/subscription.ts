import { SubscriptionClosedError } from "../errors.js";
import type { SessionEvent } from "../types.js";

/**
 * One observer's delivery queue.
 *
 * Unbounded: the drain loop pushes without waiting, a slow reader only grows
 * its own queue. The end marker is queued once and handed out once; any read
 * after it (or after detach) throws SubscriptionClosedError.
 */
export class Subscription implements AsyncIterable<Buffer> {
  private readonly queue: SessionEvent[] = [];
  private readonly waiters = new Set<() => void>();
  private ended = false;
  private endDelivered = false;
  private detached = false;
  private queuedBytes = 0;

  /** Bytes queued and not yet read. */
  get backlog(): number {
    return this.queuedBytes;
  }

  get closed(): boolean {
    return this.endDelivered || this.detached;
  }

  push(data: Buffer): void {
    if (this.ended || this.detached) return;
    this.queue.push({ type: "output", data });
    this.queuedBytes += data.length;
    this.wake();
  }

  end(): void {
    if (this.ended || this.detached) return;
    this.ended = true;
    this.queue.push({ type: "end" });
    this.wake();
  }

  detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.queue.length = 0;
    this.queuedBytes = 0;
    this.wake();
  }

  /**
   * Next event, or null when nothing arrived within `timeoutMs`. Without a
   * timeout it waits until output, the end marker or detach.
   */
  async next(timeoutMs?: number): Promise<SessionEvent | null> {
    if (this.closed) throw new SubscriptionClosedError();
    if (this.queue.length === 0) {
      await this.waitForEvent(timeoutMs);
      if (this.detached) return null;
    }
    const evt = this.queue.shift();
    if (!evt) return null;
    if (evt.type === "end") {
      this.endDelivered = true;
    } else {
      this.queuedBytes -= evt.data.length;
    }
    return evt;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    while (!this.closed) {
      const evt = await this.next();
      if (!evt || evt.type === "end") return;
      yield evt.data;
    }
  }

  private waitForEvent(timeoutMs: number | undefined): Promise<void> {
    return new Promise<void>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      if (timeoutMs !== undefined) timer = setTimeout(done, timeoutMs);
      this.waiters.add(done);
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
