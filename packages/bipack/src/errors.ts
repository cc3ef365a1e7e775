// Decode-side error types.
//
// Encoding never produces a BipackError: handing a Sink a value that does not
// fit its wire type is a caller bug and throws RangeError instead.

/** Decode failure discriminants */
export const BipackErrorCode = {
  /** Fewer bytes remain than the read requires */
  TRUNCATED: "truncated",
  /** A smartint or declared length does not fit the requested width */
  OVERFLOW: "overflow",
  /** String bytes are not valid UTF-8 */
  INVALID_ENCODING: "invalid_encoding",
  /** Input was expected to be fully consumed */
  TRAILING_BYTES: "trailing_bytes",
} as const;

export type BipackErrorCode = (typeof BipackErrorCode)[keyof typeof BipackErrorCode];

/**
 * Raised by every failed Source read.
 *
 * `offset` is the cursor position at which the failed operation started,
 * which is also where the cursor still is unless the code is
 * INVALID_ENCODING.
 */
export class BipackError extends Error {
  readonly code: BipackErrorCode;
  readonly offset: number;
  readonly detail: string | undefined;

  constructor(code: BipackErrorCode, offset: number, detail?: string) {
    const message = BipackError.codeToMessage(code);
    super(detail ? `${message} at offset ${offset}: ${detail}` : `${message} at offset ${offset}`);
    this.name = "BipackError";
    this.code = code;
    this.offset = offset;
    this.detail = detail;
  }

  isTruncated(): boolean {
    return this.code === BipackErrorCode.TRUNCATED;
  }

  isOverflow(): boolean {
    return this.code === BipackErrorCode.OVERFLOW;
  }

  isInvalidEncoding(): boolean {
    return this.code === BipackErrorCode.INVALID_ENCODING;
  }

  /** Same failure, reported against a different starting offset. */
  at(offset: number): BipackError {
    if (offset === this.offset) return this;
    return new BipackError(this.code, offset, this.detail);
  }

  private static codeToMessage(code: BipackErrorCode): string {
    switch (code) {
      case BipackErrorCode.TRUNCATED:
        return "Truncated input";
      case BipackErrorCode.OVERFLOW:
        return "Value overflow";
      case BipackErrorCode.INVALID_ENCODING:
        return "Invalid UTF-8";
      case BipackErrorCode.TRAILING_BYTES:
        return "Trailing bytes";
      default:
        return `Unknown error code: ${String(code)}`;
    }
  }
}

/**
 * Result form of a Source read, for callers that would rather branch than
 * catch.
 */
export type DecodeOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: BipackError };
