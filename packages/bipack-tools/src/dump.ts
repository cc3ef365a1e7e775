// Human-readable views of binary data, for debugging and error reports.

import { StringBuilder } from "./string_builder.ts";

const ROW = 16;

function hexByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

function printable(byte: number): string {
  return byte >= 32 && byte < 127 ? String.fromCharCode(byte) : ".";
}

/**
 * Classic hex dump, 16 bytes per row:
 *
 * ```text
 * 0000 00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f |................|
 * 0010 10 11 12 13 14 15 16 17 18 19 1a 1b 1c 1d 1e 1f |................|
 * 0020 20 21 22 23 24 25 26 27 28 29 2a 2b 2c 2d 2e 2f | !"#$%&'()*+,-./|
 * 0030 30 31                                           |01              |
 * ```
 *
 * Empty input gives an empty string.
 */
export function toDump(data: Uint8Array): string {
  const out = new StringBuilder();

  for (let row = 0; row < data.length; row += ROW) {
    const chunk = data.subarray(row, row + ROW);
    const missing = ROW - chunk.length;

    out.append(row.toString(16).toUpperCase().padStart(4, "0")).append(" ");
    for (const byte of chunk) out.append(hexByte(byte)).append(" ");
    out.append("   ".repeat(missing)).append("|");
    for (const byte of chunk) out.appendChar(printable(byte));
    out.append(" ".repeat(missing)).append("|\n");
  }

  return out.toString();
}

/**
 * One-line hex window around `offset`, with that byte in brackets. A cursor
 * at the end of the data shows as a trailing `[]`.
 *
 * @example
 * ```typescript
 * hexDumpAround(Uint8Array.of(1, 2, 3), 1, 32); // "01 [02] 03"
 * ```
 */
export function hexDumpAround(data: Uint8Array, offset: number, window: number): string {
  const start = Math.max(0, offset - 8);
  const end = Math.min(data.length, start + window);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    bytes.push(i === offset ? `[${hexByte(data[i])}]` : hexByte(data[i]));
  }
  if (offset >= data.length) bytes.push("[]");
  return bytes.join(" ");
}
