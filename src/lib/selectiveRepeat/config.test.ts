import { describe, it, expect } from "vitest";
import { resolveConfig } from "./config";
import { InvalidConfigError } from "./errors";
import { DEFAULT_CONFIG } from "./types";

describe("resolveConfig", () => {
  it("should return the defaults when nothing is overridden", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({
      windowSize: 6,
      seqSpace: 12,
      payloadSize: 20,
      retransmitInterval: 16,
      trace: 0,
    });
  });

  it("should merge overrides over the defaults", () => {
    expect(resolveConfig({ windowSize: 4, seqSpace: 8 })).toEqual({
      ...DEFAULT_CONFIG,
      windowSize: 4,
      seqSpace: 8,
    });
  });

  it("should reject a sequence space smaller than twice the window", () => {
    expect(() => resolveConfig({ windowSize: 6, seqSpace: 7 })).toThrow(
      InvalidConfigError
    );
  });

  it("should report which field is invalid", () => {
    try {
      resolveConfig({ windowSize: 6, seqSpace: 11 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.issues).toEqual([
          "seqSpace: seqSpace must be at least twice windowSize",
        ]);
      }
    }
  });

  it("should reject retransmit intervals setTimeout cannot honour", () => {
    expect(() => resolveConfig({ retransmitInterval: Infinity })).toThrow(
      InvalidConfigError
    );
    expect(() => resolveConfig({ retransmitInterval: 2 ** 31 })).toThrow(
      InvalidConfigError
    );
    expect(resolveConfig({ retransmitInterval: 2 ** 31 - 1 }).retransmitInterval).toBe(
      2 ** 31 - 1
    );
  });

  it("should reject sizes that overflow the 32-bit wire fields", () => {
    expect(() => resolveConfig({ seqSpace: 2 ** 31 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ seqSpace: 2 ** 24 + 1 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ payloadSize: 65536 })).toThrow(InvalidConfigError);
    expect(resolveConfig({ seqSpace: 2 ** 24 }).seqSpace).toBe(2 ** 24);
  });

  it("should reject non-integer and non-positive sizes", () => {
    expect(() => resolveConfig({ windowSize: 0 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ payloadSize: 2.5 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ retransmitInterval: -1 })).toThrow(
      InvalidConfigError
    );
  });
});
