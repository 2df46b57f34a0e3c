import { assertPresent } from "../streams/argument_checks.ts";
import type { ISyncLineReader } from "../streams/streams_sync.ts";

/**
 * Line reader over an in-memory string.
 *
 * Lines end at `\n`, `\r\n` or a lone `\r`. A terminator at the very end of
 * the text does not start another line, so `"a\nb\n"` reads as `"a"`, `"b"`.
 */
export class StringLineReader implements ISyncLineReader {
  #text: string;
  #position = 0;

  public constructor(text: string) {
    assertPresent(text, "text");
    this.#text = text;
  }

  public readLine(): string | undefined {
    const text = this.#text;
    if (this.#position >= text.length) {
      return undefined;
    }

    const end = findLineTerminator(text, this.#position);
    if (end < 0) {
      const rest = text.slice(this.#position);
      this.#position = text.length;
      return rest;
    }

    const line = text.slice(this.#position, end);
    this.#position = end + terminatorLength(text, end);
    return line;
  }
}

/**
 * Returns the index of the first `\r` or `\n` at or after `from`, or -1.
 */
export function findLineTerminator(text: string, from: number): number {
  for (let index = from; index < text.length; index++) {
    const code = text.charCodeAt(index);
    if (code === 0x0a || code === 0x0d) {
      return index;
    }
  }
  return -1;
}

/**
 * Length of the terminator starting at `index`: 2 for `\r\n`, otherwise 1.
 */
export function terminatorLength(text: string, index: number): number {
  return text.charCodeAt(index) === 0x0d && text.charCodeAt(index + 1) === 0x0a
    ? 2
    : 1;
}
