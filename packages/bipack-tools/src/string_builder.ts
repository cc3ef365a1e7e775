import type { Sink } from "@bipack/core";

/**
 * Accumulates text fragments for a later Sink.putStr. Joining is deferred
 * until the text is needed.
 */
export class StringBuilder {
  private parts: string[] = [];
  private size = 0;

  append(text: string): this {
    this.parts.push(text);
    this.size += text.length;
    return this;
  }

  /** Appends a single code point. */
  appendChar(char: string): this {
    const cp = char.codePointAt(0);
    if (cp === undefined || String.fromCodePoint(cp) !== char) {
      throw new RangeError(`appendChar expects one character, got ${JSON.stringify(char)}`);
    }
    return this.append(char);
  }

  /** Length in UTF-16 code units, like String#length. */
  get length(): number {
    return this.size;
  }

  toString(): string {
    if (this.parts.length > 1) this.parts = [this.parts.join("")];
    return this.parts[0] ?? "";
  }

  /** Writes the accumulated text to `sink` as a string. */
  putTo(sink: Sink): Sink {
    return sink.putStr(this.toString());
  }
}
