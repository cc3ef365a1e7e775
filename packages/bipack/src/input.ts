// Byte inputs a Source can read from.
//
// A Source never touches a Uint8Array directly; it goes through ByteInput so
// a file- or stream-backed input can stand in for the in-memory one.

import { BipackError, BipackErrorCode } from "./errors.ts";

export interface ByteInput {
  /** Bytes consumed so far. */
  readonly position: number;
  /** Bytes left to consume. */
  readonly remaining: number;
  /**
   * Up to `count` upcoming bytes, without consuming them. Shorter than
   * `count` only when fewer remain.
   */
  peek(count: number): Uint8Array;
  /**
   * Consumes exactly `count` bytes.
   *
   * @throws BipackError TRUNCATED, consuming nothing, if fewer remain
   */
  read(count: number): Uint8Array;
}

/**
 * ByteInput over a borrowed Uint8Array. The array is never written to, so
 * several inputs may share one.
 */
export class SliceInput implements ByteInput {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  peek(count: number): Uint8Array {
    return this.data.subarray(this.offset, this.offset + count);
  }

  read(count: number): Uint8Array {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`read: invalid byte count ${count}`);
    }
    if (count > this.remaining) {
      throw new BipackError(
        BipackErrorCode.TRUNCATED,
        this.offset,
        `need ${count} bytes, ${this.remaining} left`,
      );
    }
    const result = this.data.subarray(this.offset, this.offset + count);
    this.offset += count;
    return result;
  }
}
