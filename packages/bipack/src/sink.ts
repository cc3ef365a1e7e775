// Write side of the format.
//
// A Sink only grows. Values that do not fit their wire type are rejected
// with RangeError before any byte of them is written.

import {
  encodeSignedVarint,
  encodeVarint,
  MAX_I64,
  MAX_U64,
  MIN_I64,
  toBigInt,
} from "./binary/varint.ts";
import { encodeUtf8 } from "./binary/bytes.ts";

const DEFAULT_CAPACITY = 64;

export interface SinkOptions {
  /** Bytes allocated up front. Defaults to 64; the buffer doubles as needed. */
  initialCapacity?: number;
}

export class Sink {
  private buf: Uint8Array;
  private view: DataView;
  private len = 0;

  constructor(options: SinkOptions = {}) {
    const capacity = options.initialCapacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`initialCapacity must be a positive integer, got ${capacity}`);
    }
    this.buf = new Uint8Array(capacity);
    this.view = new DataView(this.buf.buffer);
  }

  /** Bytes written so far. */
  get length(): number {
    return this.len;
  }

  /** Copy of everything written. The Sink stays usable. */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  putU8(value: number): this {
    checkInt(value, 0, 0xff, "u8");
    const at = this.reserve(1);
    this.buf[at] = value;
    return this;
  }

  putU16(value: number): this {
    checkInt(value, 0, 0xffff, "u16");
    const at = this.reserve(2);
    this.view.setUint16(at, value, true);
    return this;
  }

  putU32(value: number): this {
    checkInt(value, 0, 0xffffffff, "u32");
    const at = this.reserve(4);
    this.view.setUint32(at, value, true);
    return this;
  }

  putU64(value: bigint | number): this {
    const v = toBigInt(value, "u64");
    if (v < 0n || v > MAX_U64) throw new RangeError(`u64: ${v} out of range`);
    const at = this.reserve(8);
    this.view.setBigUint64(at, v, true);
    return this;
  }

  putI8(value: number): this {
    checkInt(value, -0x80, 0x7f, "i8");
    const at = this.reserve(1);
    this.view.setInt8(at, value);
    return this;
  }

  putI16(value: number): this {
    checkInt(value, -0x8000, 0x7fff, "i16");
    const at = this.reserve(2);
    this.view.setInt16(at, value, true);
    return this;
  }

  putI32(value: number): this {
    checkInt(value, -0x80000000, 0x7fffffff, "i32");
    const at = this.reserve(4);
    this.view.setInt32(at, value, true);
    return this;
  }

  putI64(value: bigint | number): this {
    const v = toBigInt(value, "i64");
    if (v < MIN_I64 || v > MAX_I64) throw new RangeError(`i64: ${v} out of range`);
    const at = this.reserve(8);
    this.view.setBigInt64(at, v, true);
    return this;
  }

  /** Unsigned smartint. Also the length prefix of byte arrays and strings. */
  putUnsigned(value: bigint | number): this {
    return this.putFixedBytes(encodeVarint(value));
  }

  /** Zig-zag smartint. */
  putSigned(value: bigint | number): this {
    return this.putFixedBytes(encodeSignedVarint(value));
  }

  /** Raw bytes, no length prefix. */
  putFixedBytes(bytes: Uint8Array): this {
    const at = this.reserve(bytes.length);
    this.buf.set(bytes, at);
    return this;
  }

  putVarBytes(bytes: Uint8Array): this {
    this.putUnsigned(bytes.length);
    return this.putFixedBytes(bytes);
  }

  putStr(text: string): this {
    return this.putVarBytes(encodeUtf8(text));
  }

  /**
   * Claims `count` bytes at the end and returns their offset. May replace
   * `buf` and `view`, so call it before dereferencing either.
   */
  private reserve(count: number): number {
    const at = this.len;
    const needed = at + count;
    if (needed > this.buf.length) {
      const grown = new Uint8Array(Math.max(this.buf.length * 2, needed));
      grown.set(this.buf.subarray(0, at));
      this.buf = grown;
      this.view = new DataView(grown.buffer);
    }
    this.len = needed;
    return at;
  }
}

function checkInt(value: number, min: number, max: number, label: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${label}: ${value} out of range [${min}, ${max}]`);
  }
}
