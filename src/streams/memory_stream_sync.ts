import { assertPresent, assertWindow } from "./argument_checks.ts";
import { IndexOutOfRangeError } from "./stream_errors.ts";
import type {
  ISyncReadableStream,
  ISyncSeekableStream,
  ISyncWritableStream,
} from "./streams_sync.ts";

const MIN_CAPACITY = 256;

/**
 * Growable in-memory stream supporting reads, writes and seeking.
 *
 * Key features:
 * - Growable: Capacity doubles as writes extend past the current end.
 * - Shared cursor: Reads and writes advance the same `position`.
 * - Exact snapshots: `toArray()` returns only the bytes written, never the
 *   spare capacity.
 *
 * @example
 * ```typescript
 * const stream = new SyncMemoryStream();
 * stream.write(new Uint8Array([1, 2, 3]), 0, 3);
 * stream.position = 0;
 *
 * const chunk = new Uint8Array(2);
 * stream.read(chunk, 0, 2); // 2, chunk is [1, 2]
 * stream.toArray(); // Uint8Array([1, 2, 3])
 * ```
 */
export class SyncMemoryStream
  implements ISyncReadableStream, ISyncWritableStream, ISyncSeekableStream {
  #buffer: Uint8Array;
  #length: number;
  #position = 0;

  /**
   * Creates a new stream, optionally seeded with a copy of `initial`.
   * The cursor starts at 0 so seeded contents can be read back directly.
   *
   * @param initial Bytes the stream starts out containing.
   */
  public constructor(initial?: Uint8Array) {
    if (initial === undefined) {
      this.#buffer = new Uint8Array(0);
      this.#length = 0;
    } else {
      this.#buffer = initial.slice();
      this.#length = initial.length;
    }
  }

  /** Number of bytes held by the stream. */
  public get length(): number {
    return this.#length;
  }

  /** Current cursor offset. */
  public get position(): number {
    return this.#position;
  }

  /**
   * Moves the cursor. Positions past the end are allowed; a later write
   * zero-fills the gap.
   */
  public set position(value: number) {
    if (!Number.isInteger(value) || value < 0) {
      throw new IndexOutOfRangeError(
        `position must be a non-negative integer. Got ${value}`,
        "position",
        value,
      );
    }
    this.#position = value;
  }

  /** Number of bytes the stream can hold before growing. */
  public capacity(): number {
    return this.#buffer.length;
  }

  /**
   * Reads up to `count` bytes from the cursor into `buffer`.
   *
   * @returns The number of bytes copied; 0 once the cursor is at or past the end.
   * @throws IndexOutOfRangeError If the window lies outside `buffer`.
   */
  public read(buffer: Uint8Array, offset: number, count: number): number {
    assertWindow(buffer, offset, count);
    const available = this.#length - this.#position;
    if (available <= 0 || count === 0) {
      return 0;
    }
    const size = Math.min(count, available);
    buffer.set(
      this.#buffer.subarray(this.#position, this.#position + size),
      offset,
    );
    this.#position += size;
    return size;
  }

  /**
   * Writes `count` bytes from `buffer` at the cursor, growing as needed.
   *
   * @throws IndexOutOfRangeError If the window lies outside `buffer`.
   */
  public write(buffer: Uint8Array, offset: number, count: number): void {
    assertWindow(buffer, offset, count);
    if (count === 0) {
      return;
    }
    const end = this.#position + count;
    this.#ensureCapacity(end);
    this.#buffer.set(buffer.subarray(offset, offset + count), this.#position);
    this.#position = end;
    if (end > this.#length) {
      this.#length = end;
    }
  }

  /**
   * Writes the entire contents, from offset 0 regardless of the cursor, to
   * `destination` in a single call.
   *
   * The view handed to `destination` is exactly `length` bytes long and shares
   * this stream's storage; a destination that keeps it past the call must copy.
   */
  public writeTo(destination: ISyncWritableStream): void {
    assertPresent(destination, "destination");
    destination.write(this.#buffer.subarray(0, this.#length), 0, this.#length);
  }

  /**
   * Returns a copy of the stream contents, exactly `length` bytes long.
   */
  public toArray(): Uint8Array {
    return this.#buffer.slice(0, this.#length);
  }

  #ensureCapacity(required: number): void {
    if (required <= this.#buffer.length) {
      return;
    }
    const grown = Math.max(required, this.#buffer.length * 2, MIN_CAPACITY);
    const next = new Uint8Array(grown);
    next.set(this.#buffer.subarray(0, this.#length));
    this.#buffer = next;
  }
}
