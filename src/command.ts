/**
 * `bytefifo` command: argument parsing and the stdin → buffer → stdout run.
 *
 * Kept apart from cli.ts so it can be driven with in-memory streams.
 */

import { RingBuffer } from "./ring-buffer.js";
import { Pump, pipeThrough, type PumpStats, type Sink } from "./pump.js";
import { describe, hexLines } from "./format.js";
import { parseByteCount, resolveCapacity, resolveChunkSize } from "./config.js";

export const VERSION = "0.1.0";

export interface CliOptions {
  capacity?: number;
  chunk?: number;
  hex: boolean;
  stats: boolean;
  help: boolean;
  version: boolean;
}

export interface CommandIO {
  stdin: AsyncIterable<Uint8Array>;
  stdout: Sink;
  stderr: (text: string) => void;
}

export function usage(): string {
  return `bytefifo v${VERSION} — Pipe stdin to stdout through a fixed-capacity byte FIFO

Usage:
  bytefifo [--capacity N] [--chunk N] [--hex] [--stats]
  bytefifo --help | --version

Options:
  --capacity N  Buffer capacity in bytes; k/m suffixes allowed (env BYTEFIFO_CAPACITY, default 4096)
  --chunk N     Max bytes per write to stdout (env BYTEFIFO_CHUNK, default: capacity)
  --hex         Print drained bytes as a hex dump
  --stats       Print buffer state and byte totals to stderr when done`;
}

/**
 * Parse command-line arguments (without the node/script prefix).
 */
export function parseArgs(args: string[]): CliOptions {
  const opts: CliOptions = { hex: false, stats: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      opts.help = true;
    } else if (arg === "--version" || arg === "-V") {
      opts.version = true;
    } else if (arg === "--hex") {
      opts.hex = true;
    } else if (arg === "--stats") {
      opts.stats = true;
    } else if (arg === "--capacity" || arg === "-c") {
      const val = args[++i];
      if (val === undefined) throw new Error("--capacity requires a byte count");
      opts.capacity = parseByteCount(val, "--capacity");
    } else if (arg === "--chunk") {
      const val = args[++i];
      if (val === undefined) throw new Error("--chunk requires a byte count");
      opts.chunk = parseByteCount(val, "--chunk");
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return opts;
}

/**
 * Sink writing to a stream. Each chunk settles once the stream has taken it:
 * resolves on success, rejects with the write error (EPIPE when the reader
 * has gone away), so a closed consumer stops the pump.
 */
export function streamSink(stream: NodeJS.WritableStream): Sink {
  return (chunk) =>
    new Promise<void>((resolve, reject) => {
      stream.write(chunk, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
}

/**
 * Whether `err` is a write to a pipe whose reader has closed.
 */
export function isBrokenPipe(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EPIPE";
}

/**
 * Pump `io.stdin` through a RingBuffer into `io.stdout`.
 */
export async function run(opts: CliOptions, io: CommandIO): Promise<PumpStats> {
  const capacity = opts.capacity ?? resolveCapacity();
  if (capacity < 1) throw new Error("capacity must be at least 1 byte");

  const chunk = opts.chunk ?? resolveChunkSize(capacity);
  if (chunk < 1) throw new Error("--chunk must be at least 1 byte");

  const buffer = new RingBuffer(capacity);

  let offset = 0;
  const sink: Sink = opts.hex
    ? (data) => {
        const lines = hexLines(data, offset);
        offset += data.length;
        return io.stdout(Buffer.from(lines.join("\n") + "\n", "utf-8"));
      }
    : io.stdout;

  const stats = await pipeThrough(io.stdin, new Pump(buffer, sink, chunk));

  if (opts.stats) {
    io.stderr(
      `${describe(buffer)}\n` +
        `in=${stats.bytesIn} out=${stats.bytesOut} chunks=${stats.chunksOut} dropped=${stats.bytesDropped}\n`,
    );
  }

  return stats;
}
