import { describe, it, expect } from "vitest";
import { concat, decodeUtf8, encodeBytes, encodeString, encodeUtf8 } from "./bytes.ts";
import { hex, toHex } from "../test_utils.ts";

describe("bytes helpers", () => {
  it("concatenates", () => {
    expect(toHex(concat(hex("01"), new Uint8Array(0), hex("02 03")))).toBe("01 02 03");
  });

  it("length-prefixes strings and bytes", () => {
    expect(toHex(encodeString("Hi"))).toBe("02 48 69");
    expect(toHex(encodeBytes(hex("ff")))).toBe("01 ff");
  });

  it("decodes strict UTF-8", () => {
    expect(decodeUtf8(encodeUtf8("naïve"))).toBe("naïve");
    expect(decodeUtf8(hex("c3 28"))).toBeNull();
    expect(decodeUtf8(hex("e2 82"))).toBeNull();
  });
});
