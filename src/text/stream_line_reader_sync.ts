import {
  assertPresent,
  resolveTransferBuffer,
} from "../streams/argument_checks.ts";
import { DEFAULT_BUFFER_SIZE } from "../streams/stream_transfer.ts";
import type {
  ISyncLineReader,
  ISyncReadableStream,
} from "../streams/streams_sync.ts";
import { findLineTerminator, terminatorLength } from "./string_line_reader.ts";

/** Options for {@link SyncStreamLineReader}. */
export interface SyncStreamLineReaderOptions {
  /** Size of the read buffer. Defaults to {@link DEFAULT_BUFFER_SIZE}. */
  bufferSize?: number;
}

/**
 * Line reader over a UTF-8 byte stream.
 *
 * Bytes are decoded incrementally, so a multi-byte character split across two
 * reads decodes correctly; a leading byte order mark is dropped. Line endings
 * follow {@link StringLineReader}. The stream is not closed by the reader.
 */
export class SyncStreamLineReader implements ISyncLineReader {
  #stream: ISyncReadableStream;
  #buffer: Uint8Array;
  #decoder = new TextDecoder("utf-8");
  // Decoded text of the current line, already scanned and free of terminators.
  #parts: string[] = [];
  // Decoded text not yet scanned for a terminator.
  #pending = "";
  #eof = false;

  /**
   * @param stream The byte stream to read from.
   * @param options Reader options.
   */
  public constructor(
    stream: ISyncReadableStream,
    options: SyncStreamLineReaderOptions = {},
  ) {
    assertPresent(stream, "stream");
    this.#stream = stream;
    this.#buffer = resolveTransferBuffer(
      options.bufferSize ?? DEFAULT_BUFFER_SIZE,
    );
  }

  public readLine(): string | undefined {
    while (true) {
      const end = findLineTerminator(this.#pending, 0);
      if (end >= 0) {
        // A trailing \r may be the first half of \r\n.
        if (end === this.#pending.length - 1 && !this.#eof &&
          this.#pending.charCodeAt(end) === 0x0d) {
          this.#pending += this.#fill();
          continue;
        }
        const line = this.#takeLine(this.#pending.slice(0, end));
        this.#pending = this.#pending.slice(
          end + terminatorLength(this.#pending, end),
        );
        return line;
      }

      if (this.#eof) {
        if (this.#parts.length === 0 && this.#pending.length === 0) {
          return undefined;
        }
        const rest = this.#takeLine(this.#pending);
        this.#pending = "";
        return rest;
      }

      if (this.#pending.length > 0) {
        this.#parts.push(this.#pending);
      }
      this.#pending = this.#fill();
    }
  }

  #takeLine(tail: string): string {
    if (this.#parts.length === 0) {
      return tail;
    }
    this.#parts.push(tail);
    const line = this.#parts.join("");
    this.#parts = [];
    return line;
  }

  /** Reads and decodes the next block; marks end-of-data on a zero read. */
  #fill(): string {
    const read = this.#stream.read(this.#buffer, 0, this.#buffer.length);
    if (read === 0) {
      this.#eof = true;
      return this.#decoder.decode();
    }
    return this.#decoder.decode(this.#buffer.subarray(0, read), {
      stream: true,
    });
  }
}
