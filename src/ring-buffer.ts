/**
 * Fixed-capacity circular byte FIFO.
 *
 * Bytes come out in the order they went in. Writes accept only as many
 * bytes as there is free space for and reads return only what is stored;
 * the returned count (or length) is the only signal of a partial operation.
 * No allocations after construction except the copies handed out by read().
 */

/** Default buffer size: 4 KB */
export const DEFAULT_CAPACITY = 4096;

/** Point-in-time copy of a buffer's state, for diagnostics. */
export interface RingBufferSnapshot {
  capacity: number;
  readOffset: number;
  writeOffset: number;
  full: boolean;
  readable: number;
  writable: number;
  /** Copy of the whole storage region, including stale bytes */
  storage: Buffer;
}

export class RingBuffer {
  private readonly buf: Buffer;
  private readonly size: number;

  /** Next slot to read */
  private readPtr = 0;

  /** Next slot to write */
  private writePtr = 0;

  /** Pointers coincide because the buffer is full, not empty */
  private isFull = false;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError("RingBuffer capacity must be a non-negative integer");
    }
    this.size = capacity;
    this.buf = Buffer.alloc(capacity);
  }

  get capacity(): number {
    return this.size;
  }

  get readOffset(): number {
    return this.readPtr;
  }

  get writeOffset(): number {
    return this.writePtr;
  }

  get full(): boolean {
    return this.isFull;
  }

  /**
   * Write as much of `data` as fits. Bytes beyond the free space are dropped;
   * the caller retries the remainder once a reader has made room.
   *
   * @returns number of bytes actually written
   */
  write(data: Uint8Array): number {
    const avail = this.writeAvailable();
    if (avail === 0) return 0;

    const n = Math.min(data.length, avail);
    if (n === 0) return 0;

    const spaceToEnd = this.size - this.writePtr;

    if (n < spaceToEnd) {
      this.buf.set(data.subarray(0, n), this.writePtr);
      this.writePtr += n;
    } else {
      // Reaches or crosses the end of storage
      this.buf.set(data.subarray(0, spaceToEnd), this.writePtr);
      this.buf.set(data.subarray(spaceToEnd, n), 0);
      this.writePtr = n - spaceToEnd;
    }

    // Write pointer caught up with the read pointer
    if (this.writePtr === this.readPtr) this.isFull = true;
    return n;
  }

  /**
   * Read up to `maxBytes` bytes, oldest first.
   * Returns a copy; an empty Buffer when nothing is stored.
   */
  read(maxBytes: number): Buffer {
    const requested = Number.isFinite(maxBytes) ? Math.max(0, Math.floor(maxBytes)) : 0;
    const n = Math.min(requested, this.readAvailable());
    // Nothing moved: a full buffer stays full
    if (n === 0) return Buffer.alloc(0);

    const result = Buffer.alloc(n);
    const firstChunk = this.size - this.readPtr;

    if (n < firstChunk) {
      this.buf.copy(result, 0, this.readPtr, this.readPtr + n);
      this.readPtr += n;
    } else {
      this.buf.copy(result, 0, this.readPtr, this.size);
      this.buf.copy(result, firstChunk, 0, n - firstChunk);
      this.readPtr = n - firstChunk;
    }

    this.isFull = false;
    return result;
  }

  /**
   * Number of bytes stored and ready to read.
   */
  readAvailable(): number {
    const available = this.writePtr - this.readPtr;
    if (available > 0) return available;
    if (available === 0) return this.isFull ? this.size : 0;
    // Write pointer has wrapped
    return this.size - this.readPtr + this.writePtr;
  }

  /**
   * Number of free slots.
   */
  writeAvailable(): number {
    const available = this.readPtr - this.writePtr;
    if (available > 0) return available;
    if (available === 0) return this.isFull ? 0 : this.size;
    return this.size - this.writePtr + this.readPtr;
  }

  /**
   * Reset to empty. Storage is left as is; stale bytes are
   * overwritten lazily by later writes.
   */
  flush(): void {
    this.readPtr = 0;
    this.writePtr = 0;
    this.isFull = false;
  }

  snapshot(): RingBufferSnapshot {
    return {
      capacity: this.size,
      readOffset: this.readPtr,
      writeOffset: this.writePtr,
      full: this.isFull,
      readable: this.readAvailable(),
      writable: this.writeAvailable(),
      storage: Buffer.from(this.buf),
    };
  }
}
