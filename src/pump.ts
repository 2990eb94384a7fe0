/**
 * Moves a byte stream through a RingBuffer.
 *
 * The buffer itself never blocks and never signals backpressure: a write
 * that does not fit is truncated. Pump is the caller side of that contract.
 * It retries the rejected remainder after draining a chunk to the sink, and
 * drains whenever a full chunk is ready.
 */

import type { RingBuffer } from "./ring-buffer.js";

/** Receives drained bytes. May return a promise to hold the pump until the consumer is ready. */
export type Sink = (chunk: Buffer) => void | Promise<void>;

export interface PumpStats {
  /** Bytes accepted into the buffer */
  bytesIn: number;
  /** Bytes handed to the sink */
  bytesOut: number;
  /** Number of sink calls */
  chunksOut: number;
  /** Bytes that could not enter the buffer at all (zero capacity) */
  bytesDropped: number;
}

export class Pump {
  readonly stats: PumpStats = { bytesIn: 0, bytesOut: 0, chunksOut: 0, bytesDropped: 0 };
  readonly chunkSize: number;

  constructor(
    private readonly buffer: RingBuffer,
    private readonly sink: Sink,
    chunkSize: number = Math.max(1, buffer.capacity),
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError("Pump chunk size must be a positive integer");
    }
    this.chunkSize = chunkSize;
  }

  /**
   * Push `data` into the buffer, draining to the sink as often as needed
   * to make room. Returns the number of bytes accepted.
   */
  async feed(data: Uint8Array): Promise<number> {
    let rest = data;

    while (rest.length > 0) {
      const written = this.buffer.write(rest);
      this.stats.bytesIn += written;
      rest = rest.subarray(written);
      if (rest.length === 0) break;

      const drained = await this.drainOnce();
      if (written === 0 && drained === 0) {
        // Nothing fits and nothing drains: the buffer has no capacity
        this.stats.bytesDropped += rest.length;
        break;
      }
    }

    await this.drainReady();
    return data.length - rest.length;
  }

  /**
   * Drain whole chunks only; a partial chunk stays buffered.
   */
  async drainReady(): Promise<void> {
    while (this.buffer.readAvailable() >= this.chunkSize) {
      await this.drainOnce();
    }
  }

  /**
   * Drain everything, the last chunk possibly short.
   */
  async drainAll(): Promise<void> {
    while (this.buffer.readAvailable() > 0) {
      await this.drainOnce();
    }
  }

  private async drainOnce(): Promise<number> {
    const chunk = this.buffer.read(this.chunkSize);
    if (chunk.length > 0) {
      this.stats.bytesOut += chunk.length;
      this.stats.chunksOut++;
      await this.sink(chunk);
    }
    return chunk.length;
  }
}

/**
 * Feed every chunk of `source` through the pump, then drain what is left.
 */
export async function pipeThrough(
  source: AsyncIterable<Uint8Array>,
  pump: Pump,
): Promise<PumpStats> {
  for await (const chunk of source) {
    await pump.feed(chunk);
  }
  await pump.drainAll();
  return pump.stats;
}
