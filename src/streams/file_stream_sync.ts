import { closeSync, openSync, readSync, writeSync } from "node:fs";
import { assertWindow } from "./argument_checks.ts";
import type { ISyncReadableStream, ISyncWritableStream } from "./streams_sync.ts";

/**
 * Stream over a Node file descriptor using blocking `node:fs` calls.
 *
 * A stream built around an existing descriptor leaves it with the caller;
 * only a stream created by {@link SyncFileStream.open} closes its descriptor.
 *
 * @example
 * ```typescript
 * const input = SyncFileStream.open("payload.bin", "r");
 * try {
 *   const bytes = readAll(input);
 * } finally {
 *   input.close();
 * }
 * ```
 */
export class SyncFileStream implements ISyncReadableStream, ISyncWritableStream {
  #fd: number;
  #ownsDescriptor: boolean;
  #isClosed = false;

  /**
   * Wraps a descriptor the caller keeps ownership of.
   *
   * @param fd An open file descriptor.
   */
  public constructor(fd: number) {
    this.#fd = fd;
    this.#ownsDescriptor = false;
  }

  /**
   * Opens `path` with the given `node:fs` flags; the returned stream owns the
   * descriptor.
   */
  public static open(path: string, flags: string): SyncFileStream {
    const stream = new SyncFileStream(openSync(path, flags));
    stream.#ownsDescriptor = true;
    return stream;
  }

  /** The wrapped descriptor. */
  public get fd(): number {
    return this.#fd;
  }

  /**
   * Reads up to `count` bytes from the descriptor's current position.
   *
   * @returns The number of bytes read; 0 at end of file.
   */
  public read(buffer: Uint8Array, offset: number, count: number): number {
    assertWindow(buffer, offset, count);
    this.#assertOpen();
    if (count === 0) {
      return 0;
    }
    return readSync(this.#fd, buffer, offset, count, null);
  }

  /**
   * Writes `count` bytes, looping until the descriptor has accepted them all.
   *
   * @throws Error If a write call accepts no bytes.
   */
  public write(buffer: Uint8Array, offset: number, count: number): void {
    assertWindow(buffer, offset, count);
    this.#assertOpen();
    let written = 0;
    while (written < count) {
      const accepted = writeSync(
        this.#fd,
        buffer,
        offset + written,
        count - written,
      );
      if (accepted <= 0) {
        throw new Error(
          `Write made no progress after ${written} of ${count} bytes`,
        );
      }
      written += accepted;
    }
  }

  /**
   * Closes the descriptor when this stream opened it; otherwise only detaches.
   */
  public close(): void {
    if (this.#isClosed) {
      return;
    }
    this.#isClosed = true;
    if (this.#ownsDescriptor) {
      closeSync(this.#fd);
    }
  }

  #assertOpen(): void {
    if (this.#isClosed) {
      throw new Error("Cannot use a closed file stream");
    }
  }
}
