// Read side of the format.
//
// Every get either consumes exactly the bytes of one value or throws a
// BipackError with the cursor where it was. The one exception is getStr():
// once a string's length prefix and bytes are read they stay consumed, even
// if they turn out not to be UTF-8.

import { BipackError, BipackErrorCode, type DecodeOutcome } from "./errors.ts";
import { SliceInput, type ByteInput } from "./input.ts";
import { decodeVarint, zigzagDecode, type DecodeResult } from "./binary/varint.ts";
import { decodeUtf8 } from "./binary/bytes.ts";

export interface SourceOptions {
  /**
   * Largest length accepted for a variable byte array or string. Longer
   * declared lengths fail with OVERFLOW before anything is consumed.
   * Defaults to no limit other than the input itself.
   */
  maxVarBytesLength?: number;
}

export class Source {
  protected readonly input: ByteInput;
  private readonly maxVarBytesLength: number | undefined;

  constructor(input: Uint8Array | ByteInput, options: SourceOptions = {}) {
    this.input = input instanceof Uint8Array ? new SliceInput(input) : input;
    this.maxVarBytesLength = options.maxVarBytesLength;
  }

  /** Bytes consumed so far. */
  get position(): number {
    return this.input.position;
  }

  get remaining(): number {
    return this.input.remaining;
  }

  /** True once every byte has been consumed. */
  get isEnd(): boolean {
    return this.input.remaining === 0;
  }

  /**
   * @throws BipackError TRAILING_BYTES if any input is left
   */
  expectEnd(): void {
    if (!this.isEnd) {
      const error = new BipackError(
        BipackErrorCode.TRAILING_BYTES,
        this.position,
        `${this.remaining} unread bytes`,
      );
      this.onError("expectEnd", error);
      throw error;
    }
  }

  /**
   * Runs a read and reports its failure as a value instead of throwing.
   * Only BipackError is caught.
   *
   * @example
   * ```typescript
   * const r = source.tryGet((s) => s.getStr());
   * if (!r.ok) source.tryGet((s) => s.getVarBytes());
   * ```
   */
  tryGet<T>(read: (source: this) => T): DecodeOutcome<T> {
    try {
      return { ok: true, value: read(this) };
    } catch (error) {
      if (error instanceof BipackError) return { ok: false, error };
      throw error;
    }
  }

  // ==========================================================================
  // Fixed-width integers (little-endian)
  // ==========================================================================

  getU8(): number {
    return this.guard("getU8", () => this.input.read(1)[0]);
  }

  getU16(): number {
    return this.guard("getU16", () => view(this.input.read(2)).getUint16(0, true));
  }

  getU32(): number {
    return this.guard("getU32", () => view(this.input.read(4)).getUint32(0, true));
  }

  getU64(): bigint {
    return this.guard("getU64", () => view(this.input.read(8)).getBigUint64(0, true));
  }

  getI8(): number {
    return this.guard("getI8", () => view(this.input.read(1)).getInt8(0));
  }

  getI16(): number {
    return this.guard("getI16", () => view(this.input.read(2)).getInt16(0, true));
  }

  getI32(): number {
    return this.guard("getI32", () => view(this.input.read(4)).getInt32(0, true));
  }

  getI64(): bigint {
    return this.guard("getI64", () => view(this.input.read(8)).getBigInt64(0, true));
  }

  // ==========================================================================
  // Smartints
  // ==========================================================================

  /** Unsigned smartint, full 64-bit range. */
  getUnsigned(): bigint {
    return this.guard("getUnsigned", () => this.readVarint(64));
  }

  /** Unsigned smartint that must fit Number.MAX_SAFE_INTEGER. */
  getUnsignedNumber(): number {
    return this.guard("getUnsignedNumber", () => {
      const start = this.input.position;
      const { value, next } = this.peekVarint(64);
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new BipackError(BipackErrorCode.OVERFLOW, start, "smartint too large for number");
      }
      this.input.read(next);
      return Number(value);
    });
  }

  getPackedU16(): number {
    return this.guard("getPackedU16", () => Number(this.readVarint(16)));
  }

  getPackedU32(): number {
    return this.guard("getPackedU32", () => Number(this.readVarint(32)));
  }

  /** Zig-zag smartint, full 64-bit range. */
  getSigned(): bigint {
    return this.guard("getSigned", () => zigzagDecode(this.readVarint(64)));
  }

  /** Zig-zag smartint that must fit the safe integer range. */
  getSignedNumber(): number {
    return this.guard("getSignedNumber", () => {
      const start = this.input.position;
      const { value, next } = this.peekVarint(64);
      const signed = zigzagDecode(value);
      if (signed > BigInt(Number.MAX_SAFE_INTEGER) || signed < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new BipackError(BipackErrorCode.OVERFLOW, start, "signed smartint too large for number");
      }
      this.input.read(next);
      return Number(signed);
    });
  }

  getPackedI32(): number {
    return this.guard("getPackedI32", () => Number(zigzagDecode(this.readVarint(32))));
  }

  // ==========================================================================
  // Byte arrays and strings
  // ==========================================================================

  /** Exactly `count` bytes, copied out of the input. */
  getFixedBytes(count: number): Uint8Array {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`getFixedBytes: invalid byte count ${count}`);
    }
    return this.guard("getFixedBytes", () => this.input.read(count).slice());
  }

  /** Smartint length, then that many bytes. */
  getVarBytes(): Uint8Array {
    return this.guard("getVarBytes", () => this.readVarBytes());
  }

  /**
   * A length-prefixed UTF-8 string.
   *
   * On INVALID_ENCODING the string's bytes have been consumed: the cursor is
   * past them, not at `error.offset`.
   */
  getStr(): string {
    return this.guard("getStr", () => {
      const start = this.input.position;
      const text = decodeUtf8(this.readVarBytes());
      if (text === null) {
        throw new BipackError(BipackErrorCode.INVALID_ENCODING, start);
      }
      return text;
    });
  }

  /**
   * Called with every BipackError before it leaves a get. Does nothing by
   * default; subclasses use it for diagnostics.
   */
  protected onError(_operation: string, _error: BipackError): void {}

  private guard<T>(operation: string, read: () => T): T {
    try {
      return read();
    } catch (error) {
      if (error instanceof BipackError) this.onError(operation, error);
      throw error;
    }
  }

  /** Decodes the smartint at the cursor without consuming it. */
  private peekVarint(maxBits: number): DecodeResult<bigint> {
    const start = this.input.position;
    try {
      return decodeVarint(this.input.peek(Math.ceil(maxBits / 7)), 0, maxBits);
    } catch (error) {
      if (error instanceof BipackError) throw error.at(start);
      throw error;
    }
  }

  private readVarint(maxBits: number): bigint {
    const { value, next } = this.peekVarint(maxBits);
    this.input.read(next);
    return value;
  }

  private readVarBytes(): Uint8Array {
    const start = this.input.position;
    const { value: length, next } = this.peekVarint(64);
    if (this.maxVarBytesLength !== undefined && length > BigInt(this.maxVarBytesLength)) {
      throw new BipackError(
        BipackErrorCode.OVERFLOW,
        start,
        `length ${length} exceeds limit ${this.maxVarBytesLength}`,
      );
    }
    const available = this.input.remaining - next;
    if (length > BigInt(available)) {
      throw new BipackError(
        BipackErrorCode.TRUNCATED,
        start,
        `need ${length} bytes, ${available} left`,
      );
    }

    this.input.read(next);
    return this.input.read(Number(length)).slice();
  }
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
