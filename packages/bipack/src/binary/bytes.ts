import { encodeVarint } from "./varint.ts";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

export function encodeUtf8(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

/** Strict UTF-8 decode; null when the bytes are not well-formed. */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8Decoder.decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) return null;
    throw e;
  }
}

/** Length-prefixed UTF-8, the same bytes `Sink.putStr` writes. */
export function encodeString(str: string): Uint8Array {
  return encodeBytes(encodeUtf8(str));
}

/** Length-prefixed bytes, the same bytes `Sink.putVarBytes` writes. */
export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concat(encodeVarint(bytes.length), bytes);
}
