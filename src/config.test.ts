import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { parseByteCount, resolveCapacity, resolveChunkSize } from "./config.js";

describe("config", () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    delete process.env["BYTEFIFO_CAPACITY"];
    delete process.env["BYTEFIFO_CHUNK"];
  });

  afterEach(() => {
    // Restore env
    process.env = { ...origEnv };
  });

  describe("parseByteCount", () => {
    it("parses plain byte counts", () => {
      expect(parseByteCount("512", "size")).toBe(512);
      expect(parseByteCount(" 8 ", "size")).toBe(8);
      expect(parseByteCount("0", "size")).toBe(0);
    });

    it("applies k and m suffixes", () => {
      expect(parseByteCount("64k", "size")).toBe(65536);
      expect(parseByteCount("1M", "size")).toBe(1048576);
    });

    it("rejects anything else", () => {
      expect(() => parseByteCount("abc", "size")).toThrow('Invalid size "abc"');
      expect(() => parseByteCount("-1", "size")).toThrow('Invalid size "-1"');
      expect(() => parseByteCount("1.5k", "size")).toThrow('Invalid size "1.5k"');
      expect(() => parseByteCount("", "size")).toThrow('Invalid size ""');
    });
  });

  describe("resolveCapacity", () => {
    it("defaults to 4096", () => {
      expect(resolveCapacity()).toBe(4096);
    });

    it("uses BYTEFIFO_CAPACITY when set", () => {
      process.env["BYTEFIFO_CAPACITY"] = "16k";
      expect(resolveCapacity()).toBe(16384);
    });

    it("reports a malformed BYTEFIFO_CAPACITY", () => {
      process.env["BYTEFIFO_CAPACITY"] = "bogus";
      expect(() => resolveCapacity()).toThrow('Invalid BYTEFIFO_CAPACITY "bogus"');
    });
  });

  describe("resolveChunkSize", () => {
    it("defaults to the capacity", () => {
      expect(resolveChunkSize(100)).toBe(100);
    });

    it("is at least 1 for a zero capacity", () => {
      expect(resolveChunkSize(0)).toBe(1);
    });

    it("uses BYTEFIFO_CHUNK when set", () => {
      process.env["BYTEFIFO_CHUNK"] = "32";
      expect(resolveChunkSize(100)).toBe(32);
    });

    it("rejects a zero BYTEFIFO_CHUNK", () => {
      process.env["BYTEFIFO_CHUNK"] = "0";
      expect(() => resolveChunkSize(100)).toThrow("BYTEFIFO_CHUNK must be at least 1");
    });
  });
});
