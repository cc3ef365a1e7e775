// One-call helpers for short messages.

import { Sink } from "./sink.ts";
import { Source, type SourceOptions } from "./source.ts";

export type Packable = string | number | bigint | Uint8Array;

/**
 * Packs each value by its runtime type: strings with putStr, byte arrays
 * with putVarBytes, non-negative integers with putUnsigned and negative ones
 * with putSigned.
 *
 * @example
 * ```typescript
 * pack("Hi", 300); // 02 48 69 ac 02
 * ```
 */
export function pack(...values: Packable[]): Uint8Array {
  const sink = new Sink();
  for (const value of values) {
    if (typeof value === "string") {
      sink.putStr(value);
    } else if (value instanceof Uint8Array) {
      sink.putVarBytes(value);
    } else if (typeof value === "bigint" ? value < 0n : value < 0) {
      sink.putSigned(value);
    } else {
      sink.putUnsigned(value);
    }
  }
  return sink.toBytes();
}

/**
 * Reads a whole buffer with `read` and requires every byte to be consumed.
 *
 * @throws BipackError from `read`, or TRAILING_BYTES if input is left over
 *
 * @example
 * ```typescript
 * const [name, count] = unpack(bytes, (s) => [s.getStr(), s.getUnsignedNumber()] as const);
 * ```
 */
export function unpack<T>(bytes: Uint8Array, read: (source: Source) => T, options?: SourceOptions): T {
  const source = new Source(bytes, options);
  const value = read(source);
  source.expectEnd();
  return value;
}
