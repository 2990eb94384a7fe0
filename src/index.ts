export { RingBuffer, DEFAULT_CAPACITY, type RingBufferSnapshot } from "./ring-buffer.js";
export { describe, debugDescribe, hexString, hexLines, HEX_LINE_WIDTH } from "./format.js";
export { Pump, pipeThrough, type PumpStats, type Sink } from "./pump.js";
export { parseByteCount, resolveCapacity, resolveChunkSize } from "./config.js";
