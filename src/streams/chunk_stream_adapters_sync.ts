import { assertPresent, assertWindow } from "./argument_checks.ts";
import type {
  ISyncChunkSink,
  ISyncChunkSource,
  ISyncReadableStream,
  ISyncWritableStream,
} from "./streams_sync.ts";

/**
 * Adapter that wraps an ISyncChunkSource to provide the ISyncReadableStream
 * interface. Each read is served from at most one chunk, so a request larger
 * than the pending chunk is answered with a short read.
 */
export class SyncChunkReadableStreamAdapter implements ISyncReadableStream {
  #source: ISyncChunkSource;
  #pending: Uint8Array = new Uint8Array(0);
  #pendingOffset = 0;
  #eof = false;

  /**
   * Creates a new adapter from a chunk source.
   *
   * @param source The chunk source to adapt.
   */
  public constructor(source: ISyncChunkSource) {
    assertPresent(source, "source");
    this.#source = source;
  }

  /**
   * Reads up to `count` bytes from the current chunk, pulling the next
   * non-empty chunk when the current one is used up.
   *
   * @returns The number of bytes copied; 0 once the source is exhausted.
   */
  public read(buffer: Uint8Array, offset: number, count: number): number {
    assertWindow(buffer, offset, count);
    if (count === 0 || !this.#fill()) {
      return 0;
    }

    const size = Math.min(count, this.#pending.length - this.#pendingOffset);
    buffer.set(
      this.#pending.subarray(this.#pendingOffset, this.#pendingOffset + size),
      offset,
    );
    this.#pendingOffset += size;
    return size;
  }

  /**
   * Closes the underlying chunk source.
   */
  public close(): void {
    this.#source.close();
  }

  #fill(): boolean {
    while (this.#pendingOffset >= this.#pending.length) {
      if (this.#eof) {
        return false;
      }
      const chunk = this.#source.readNext();
      if (chunk === undefined) {
        this.#eof = true;
        return false;
      }
      this.#pending = chunk;
      this.#pendingOffset = 0;
    }
    return true;
  }
}

/**
 * Adapter that wraps an ISyncChunkSink to provide the ISyncWritableStream
 * interface. Writes are passed through to the underlying sink.
 */
export class SyncChunkWritableStreamAdapter implements ISyncWritableStream {
  #sink: ISyncChunkSink;
  #isClosed = false;

  /**
   * Creates a new adapter from a chunk sink.
   *
   * @param sink The chunk sink to adapt.
   */
  public constructor(sink: ISyncChunkSink) {
    assertPresent(sink, "sink");
    this.#sink = sink;
  }

  /**
   * Writes a slice of `buffer` to the sink. Zero-length writes are dropped.
   *
   * @throws Error If the adapter has been closed.
   */
  public write(buffer: Uint8Array, offset: number, count: number): void {
    assertWindow(buffer, offset, count);
    if (this.#isClosed) {
      throw new Error("Cannot write to a closed stream");
    }
    if (count === 0) {
      return;
    }
    this.#sink.writeBytesFrom(buffer, offset, count);
  }

  /**
   * Closes the underlying sink. Further writes throw.
   */
  public close(): void {
    if (!this.#isClosed) {
      this.#isClosed = true;
      this.#sink.close();
    }
  }
}
