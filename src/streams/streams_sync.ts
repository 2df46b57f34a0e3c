/**
 * Interfaces describing the synchronous stream capabilities the transfer
 * helpers operate on. Implementations own their resources; the helpers never
 * close a handle they were given.
 */

/**
 * A sequential byte source.
 */
export interface ISyncReadableStream {
  /**
   * Reads up to `count` bytes into `buffer` starting at `offset`.
   * Returns the number of bytes read; `0` signals end-of-data. Returning fewer
   * bytes than requested is allowed at any point.
   */
  read(buffer: Uint8Array, offset: number, count: number): number;
}

/**
 * A sequential byte sink.
 */
export interface ISyncWritableStream {
  /**
   * Writes `count` bytes from `buffer` starting at `offset`.
   */
  write(buffer: Uint8Array, offset: number, count: number): void;
}

/**
 * A stream with a movable cursor and a known length.
 */
export interface ISyncSeekableStream {
  position: number;
  readonly length: number;
}

/**
 * Reader producing text one line at a time.
 */
export interface ISyncLineReader {
  /**
   * Returns the next line without its terminator, or undefined once the
   * underlying text is exhausted.
   */
  readLine(): string | undefined;
}

/**
 * Chunk-oriented source, the shape produced by framing and decoding layers.
 */
export interface ISyncChunkSource {
  /**
   * Reads the next chunk of data.
   * Returns undefined when the source is exhausted.
   */
  readNext(): Uint8Array | undefined;

  /**
   * Closes the source and releases any held resources.
   */
  close(): void;
}

/**
 * Chunk-oriented sink.
 */
export interface ISyncChunkSink {
  writeBytes(data: Uint8Array): void;

  /**
   * Writes a slice of bytes without requiring a subarray view.
   */
  writeBytesFrom(data: Uint8Array, offset: number, length: number): void;

  close(): void;
}
