import { describe, it, expect } from "vitest";
import { pack, unpack } from "./pack.ts";
import { BipackError, BipackErrorCode } from "./errors.ts";
import { hex, toHex } from "./test_utils.ts";

describe("pack", () => {
  it("chooses the encoding from each value's type", () => {
    expect(toHex(pack("Hi", 300))).toBe("02 48 69 ac 02");
    expect(toHex(pack(-1, 1n, hex("aa")))).toBe("01 01 01 aa");
    expect(toHex(pack(-2n))).toBe("03");
  });

  it("returns an empty buffer for no values", () => {
    expect(pack()).toHaveLength(0);
  });
});

describe("unpack", () => {
  it("reads the whole buffer", () => {
    const [name, count] = unpack(pack("widget", 42), (s) => [s.getStr(), s.getUnsignedNumber()] as const);
    expect(name).toBe("widget");
    expect(count).toBe(42);
  });

  it("fails with TRAILING_BYTES when input is left over", () => {
    expect(() => unpack(pack("a", 1), (s) => s.getStr())).toThrow(BipackError);
    try {
      unpack(pack("a", 1), (s) => s.getStr());
    } catch (error) {
      expect(error instanceof BipackError && error.code).toBe(BipackErrorCode.TRAILING_BYTES);
    }
  });

  it("passes options through to the Source", () => {
    const read = () => unpack(pack("abcd"), (s) => s.getStr(), { maxVarBytesLength: 2 });
    expect(read).toThrow("Value overflow at offset 0: length 4 exceeds limit 2");
  });
});
