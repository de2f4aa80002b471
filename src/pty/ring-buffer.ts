/**
 * Byte ring buffer for terminal history.
 *
 * Keeps the most recent `capacity` bytes in emission order. Chunks are stored
 * as-is and the oldest chunk is trimmed (or dropped) once the total exceeds
 * the capacity, so appends never copy the whole history.
 */
export class ByteRingBuffer {
  private chunks: Buffer[] = [];
  private totalBytes = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.totalBytes;
  }

  append(data: Buffer): void {
    if (data.length === 0) return;
    // A single chunk larger than the capacity only contributes its tail.
    const chunk = data.length > this.capacity ? data.subarray(data.length - this.capacity) : data;
    this.chunks.push(chunk);
    this.totalBytes += chunk.length;

    let excess = this.totalBytes - this.capacity;
    while (excess > 0) {
      const head = this.chunks[0];
      if (!head) break;
      if (head.length <= excess) {
        this.chunks.shift();
        this.totalBytes -= head.length;
        excess -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.totalBytes -= excess;
        excess = 0;
      }
    }
  }

  /** Contents as one contiguous buffer, oldest byte first. */
  snapshot(): Buffer {
    if (this.chunks.length === 1 && this.chunks[0]) return Buffer.from(this.chunks[0]);
    return Buffer.concat(this.chunks, this.totalBytes);
  }

  clear(): void {
    this.chunks = [];
    this.totalBytes = 0;
  }
}
