/**
 * Human-readable renderings of ring buffer state and raw bytes.
 *
 * Kept outside RingBuffer so the core type carries no presentation code.
 */

import type { RingBuffer, RingBufferSnapshot } from "./ring-buffer.js";

/** Bytes per line in hexLines() output */
export const HEX_LINE_WIDTH = 16;

function toSnapshot(source: RingBuffer | RingBufferSnapshot): RingBufferSnapshot {
  return "snapshot" in source ? source.snapshot() : source;
}

/**
 * Upper-case two-digit hex for each byte, space separated: "0A FF 00".
 */
export function hexString(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}

/**
 * One-line summary of pointers and occupancy.
 */
export function describe(source: RingBuffer | RingBufferSnapshot): string {
  const s = toSnapshot(source);
  return (
    `RingBuffer(capacity=${s.capacity}, read=${s.readOffset}, write=${s.writeOffset}, ` +
    `full=${s.full}, readable=${s.readable}, writable=${s.writable})`
  );
}

/**
 * Summary line followed by a hex dump of the whole storage region,
 * stale bytes included.
 */
export function debugDescribe(source: RingBuffer | RingBufferSnapshot): string {
  const s = toSnapshot(source);
  return `${describe(s)}\n${hexString(s.storage)}`;
}

/**
 * Offset-prefixed hex dump lines, `HEX_LINE_WIDTH` bytes per line.
 * `startOffset` lets consecutive calls continue one running dump.
 */
export function hexLines(data: Uint8Array, startOffset = 0): string[] {
  const lines: string[] = [];
  for (let i = 0; i < data.length; i += HEX_LINE_WIDTH) {
    const offset = (startOffset + i).toString(16).padStart(8, "0");
    lines.push(`${offset}  ${hexString(data.subarray(i, i + HEX_LINE_WIDTH))}`);
  }
  return lines;
}
