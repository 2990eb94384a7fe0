/**
 * Environment-derived defaults.
 *
 *   BYTEFIFO_CAPACITY  buffer capacity in bytes (default 4096)
 *   BYTEFIFO_CHUNK     max bytes per drain (default: the capacity)
 *
 * Sizes accept a plain byte count or a k/m suffix (1024-based): "64k", "1m".
 * CLI flags take precedence over both.
 */

import { DEFAULT_CAPACITY } from "./ring-buffer.js";

const MULTIPLIERS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 * 1024,
};

/**
 * Parse a byte count such as "512", "64k" or "1M".
 */
export function parseByteCount(value: string, label: string): number {
  const match = /^(\d+)([kKmM]?)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid ${label} "${value}": expected a byte count like 512, 64k or 1m`);
  }
  const bytes = parseInt(match[1], 10) * MULTIPLIERS[match[2].toLowerCase()];
  if (!Number.isSafeInteger(bytes)) {
    throw new Error(`Invalid ${label} "${value}": too large`);
  }
  return bytes;
}

/**
 * Buffer capacity: BYTEFIFO_CAPACITY when set, else DEFAULT_CAPACITY.
 */
export function resolveCapacity(): number {
  const raw = process.env["BYTEFIFO_CAPACITY"];
  if (raw) {
    return parseByteCount(raw, "BYTEFIFO_CAPACITY");
  }
  return DEFAULT_CAPACITY;
}

/**
 * Drain size: BYTEFIFO_CHUNK when set, else the whole capacity.
 * Never less than 1, so a drain always makes progress.
 */
export function resolveChunkSize(capacity: number): number {
  const raw = process.env["BYTEFIFO_CHUNK"];
  if (raw) {
    const chunk = parseByteCount(raw, "BYTEFIFO_CHUNK");
    if (chunk < 1) throw new Error("BYTEFIFO_CHUNK must be at least 1");
    return chunk;
  }
  return Math.max(1, capacity);
}
