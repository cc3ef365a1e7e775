/**
 * Smartint encoding/decoding.
 *
 * A smartint is LEB128: 7 value bits per byte, least-significant group
 * first, with the high bit set on every byte except the last. Signed values
 * are zig-zag folded first so small magnitudes of either sign stay short.
 */

import { BipackError, BipackErrorCode } from "../errors.ts";

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

export const MAX_U64 = (1n << 64n) - 1n;
export const MIN_I64 = -(1n << 63n);
export const MAX_I64 = (1n << 63n) - 1n;

/** Longest encoding of a 64-bit value. */
export const MAX_VARINT_LENGTH = 10;

/**
 * Normalizes an integer argument to a bigint.
 *
 * @throws RangeError if a number is not a safe integer
 */
export function toBigInt(value: bigint | number, label: string): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${label}: ${value} is not a safe integer`);
  }
  return BigInt(value);
}

function checkUnsigned(value: bigint | number): bigint {
  const v = toBigInt(value, "varint");
  if (v < 0n) throw new RangeError("Cannot encode negative value as unsigned varint");
  if (v > MAX_U64) throw new RangeError(`varint: ${v} does not fit in 64 bits`);
  return v;
}

/**
 * Encodes an unsigned 64-bit integer as a smartint.
 *
 * @throws RangeError if the value is negative or wider than 64 bits
 */
export function encodeVarint(value: bigint | number): Uint8Array {
  let remaining = checkUnsigned(value);
  const out: number[] = [];

  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);

  return Uint8Array.from(out);
}

/** Number of bytes {@link encodeVarint} produces for `value`. */
export function varintLength(value: bigint | number): number {
  let remaining = checkUnsigned(value);
  let length = 1;
  while (remaining > 0x7fn) {
    remaining >>= 7n;
    length++;
  }
  return length;
}

/**
 * Decodes an unsigned smartint starting at `offset`.
 *
 * `maxBits` narrows the accepted range for fixed-width targets: at most
 * ceil(maxBits / 7) bytes are read and the value must be below 2^maxBits.
 * Non-minimal encodings (redundant trailing zero groups) are accepted.
 *
 * @throws BipackError TRUNCATED if the input ends mid-chain, OVERFLOW if the
 *   value does not fit. The error offset is `offset`.
 */
export function decodeVarint(buf: Uint8Array, offset: number, maxBits = 64): DecodeResult<bigint> {
  const maxGroups = Math.ceil(maxBits / 7);
  const limit = (1n << BigInt(maxBits)) - 1n;
  let result = 0n;
  let shift = 0n;
  let groups = 0;
  let i = offset;

  while (true) {
    if (i >= buf.length) {
      throw new BipackError(BipackErrorCode.TRUNCATED, offset, "unterminated smartint");
    }
    const byte = buf[i++];
    groups++;
    result |= BigInt(byte & 0x7f) << shift;

    if ((byte & 0x80) === 0) {
      if (result > limit) {
        throw new BipackError(BipackErrorCode.OVERFLOW, offset, `smartint exceeds ${maxBits} bits`);
      }
      return { value: result, next: i };
    }
    if (groups === maxGroups) {
      throw new BipackError(BipackErrorCode.OVERFLOW, offset, `smartint longer than ${maxGroups} bytes`);
    }
    shift += 7n;
  }
}

/**
 * Decodes an unsigned smartint as a number.
 *
 * @throws BipackError OVERFLOW if the value is above Number.MAX_SAFE_INTEGER
 */
export function decodeVarintNumber(buf: Uint8Array, offset: number): DecodeResult<number> {
  const { value, next } = decodeVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new BipackError(BipackErrorCode.OVERFLOW, offset, "smartint too large for number");
  }
  return { value: Number(value), next };
}

/**
 * Zig-zag fold: 0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3, 2 -> 4, ...
 *
 * @throws RangeError outside [-2^63, 2^63 - 1]
 */
export function zigzagEncode(value: bigint | number): bigint {
  const v = toBigInt(value, "signed varint");
  if (v < MIN_I64 || v > MAX_I64) {
    throw new RangeError(`signed varint: ${v} does not fit in 64 bits`);
  }
  return (v << 1n) ^ (v >> 63n);
}

export function zigzagDecode(value: bigint): bigint {
  return (value >> 1n) ^ -(value & 1n);
}

export function encodeSignedVarint(value: bigint | number): Uint8Array {
  return encodeVarint(zigzagEncode(value));
}

/**
 * Decodes a zig-zag smartint. With `maxBits` below 64 the folded value must
 * fit that many bits, which is exactly the range of a signed integer of the
 * same width.
 */
export function decodeSignedVarint(buf: Uint8Array, offset: number, maxBits = 64): DecodeResult<bigint> {
  const { value, next } = decodeVarint(buf, offset, maxBits);
  return { value: zigzagDecode(value), next };
}

export function decodeSignedVarintNumber(buf: Uint8Array, offset: number): DecodeResult<number> {
  const { value, next } = decodeSignedVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new BipackError(BipackErrorCode.OVERFLOW, offset, "signed smartint too large for number");
  }
  return { value: Number(value), next };
}
