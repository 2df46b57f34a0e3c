import {
  assertPresent,
  resolveTransferBuffer,
} from "./argument_checks.ts";
import { SyncMemoryStream } from "./memory_stream_sync.ts";
import {
  IndexOutOfRangeError,
  UnexpectedEndOfStreamError,
} from "./stream_errors.ts";
import type {
  ISyncLineReader,
  ISyncReadableStream,
  ISyncWritableStream,
} from "./streams_sync.ts";

/** Transfer buffer size used when the caller does not supply one. */
export const DEFAULT_BUFFER_SIZE = 8 * 1024;

/** Transfer buffer size used by {@link writeTo}. */
export const WRITE_TO_BUFFER_SIZE = 4 * 1024;

/**
 * Copies everything remaining in `source` to `destination`.
 *
 * A `SyncMemoryStream` source is written out whole in one call, starting from
 * offset 0 whatever its cursor; any other source is copied through a
 * {@link WRITE_TO_BUFFER_SIZE} buffer until it reports end-of-data.
 */
export function writeTo(
  source: ISyncReadableStream,
  destination: ISyncWritableStream,
): void {
  assertPresent(source, "source");
  assertPresent(destination, "destination");

  if (source instanceof SyncMemoryStream) {
    source.writeTo(destination);
    return;
  }

  const data = new Uint8Array(WRITE_TO_BUFFER_SIZE);
  let bytesRead: number;
  while ((bytesRead = source.read(data, 0, data.length)) > 0) {
    destination.write(data, 0, bytesRead);
  }
}

/**
 * Copies all the data from one stream into another, reading until `source`
 * reports end-of-data with a zero-length read.
 *
 * When a buffer is supplied its current contents are ignored, so it needn't be
 * cleared beforehand.
 *
 * @param source The stream to drain, from its current position.
 * @param destination The stream receiving every chunk read.
 * @param bufferOrSize A transfer buffer, or the size of one to allocate.
 * @throws InvalidArgumentError If a stream or buffer is absent, the buffer is
 * empty, or the size is not a positive integer.
 */
export function copyAll(
  source: ISyncReadableStream,
  destination: ISyncWritableStream,
  bufferOrSize: number | Uint8Array = DEFAULT_BUFFER_SIZE,
): void {
  assertPresent(source, "source");
  assertPresent(destination, "destination");
  const buffer = resolveTransferBuffer(bufferOrSize);

  let read: number;
  while ((read = source.read(buffer, 0, buffer.length)) > 0) {
    destination.write(buffer, 0, read);
  }
}

/**
 * Reads the given stream up to the end, returning the data as a byte array of
 * exactly the length read.
 *
 * @param source The stream to drain, from its current position.
 * @param bufferOrSize A transfer buffer, or the size of one to allocate.
 * @throws InvalidArgumentError Under the same conditions as {@link copyAll}.
 */
export function readAll(
  source: ISyncReadableStream,
  bufferOrSize: number | Uint8Array = DEFAULT_BUFFER_SIZE,
): Uint8Array {
  assertPresent(source, "source");
  const buffer = resolveTransferBuffer(bufferOrSize);

  const accumulator = new SyncMemoryStream();
  copyAll(source, accumulator, buffer);
  return accumulator.toArray();
}

/**
 * Reads exactly `bytesToRead` bytes into a newly allocated buffer.
 */
export function readExactly(
  source: ISyncReadableStream,
  bytesToRead: number,
): Uint8Array;
/**
 * Reads into `buffer`, filling it completely.
 */
export function readExactly(
  source: ISyncReadableStream,
  buffer: Uint8Array,
): Uint8Array;
/**
 * Reads exactly `bytesToRead` bytes into `buffer`, starting at index 0.
 */
export function readExactly(
  source: ISyncReadableStream,
  buffer: Uint8Array,
  bytesToRead: number,
): Uint8Array;
/**
 * Reads exactly `bytesToRead` bytes into `buffer` starting at `startIndex`.
 * Short reads are looped on; only a zero-length read ends the loop early.
 *
 * @returns The same buffer, populated over the requested range.
 * @throws InvalidArgumentError If `source` or `buffer` is absent.
 * @throws IndexOutOfRangeError If the requested window falls outside `buffer`
 * or `bytesToRead` is less than 1.
 * @throws UnexpectedEndOfStreamError If `source` runs out first.
 */
export function readExactly(
  source: ISyncReadableStream,
  buffer: Uint8Array,
  startIndex: number,
  bytesToRead: number,
): Uint8Array;
export function readExactly(
  source: ISyncReadableStream,
  target: Uint8Array | number,
  startOrCount?: number,
  count?: number,
): Uint8Array {
  assertPresent(source, "source");

  if (typeof target === "number") {
    assertByteCount(target);
    return readExactlyUnchecked(source, new Uint8Array(target), 0, target);
  }

  assertPresent(target, "buffer");
  let startIndex = 0;
  let bytesToRead = target.length;
  if (count !== undefined) {
    startIndex = startOrCount ?? 0;
    bytesToRead = count;
  } else if (startOrCount !== undefined) {
    bytesToRead = startOrCount;
  }

  if (
    !Number.isInteger(startIndex) || startIndex < 0 ||
    startIndex >= target.length
  ) {
    throw new IndexOutOfRangeError(
      `startIndex must be within [0, ${target.length}). Got startIndex=${startIndex}`,
      "startIndex",
      startIndex,
    );
  }
  assertByteCount(bytesToRead);
  if (startIndex + bytesToRead > target.length) {
    throw new IndexOutOfRangeError(
      `bytesToRead exceeds buffer bounds. startIndex=${startIndex}, bytesToRead=${bytesToRead}, bufferLength=${target.length}`,
      "bytesToRead",
      bytesToRead,
    );
  }

  return readExactlyUnchecked(source, target, startIndex, bytesToRead);
}

/**
 * Returns a lazy, single-pass iterator over the lines of `reader`. Advancing
 * the iterator consumes the reader; iteration stops at the reader's
 * end-of-stream marker.
 *
 * @throws InvalidArgumentError Immediately, if `reader` is absent.
 */
export function lines(reader: ISyncLineReader): IterableIterator<string> {
  assertPresent(reader, "reader");
  return readLines(reader);
}

function* readLines(reader: ISyncLineReader): Generator<string, void, undefined> {
  let line: string | undefined;
  while ((line = reader.readLine()) !== undefined) {
    yield line;
  }
}

function assertByteCount(bytesToRead: number): void {
  if (!Number.isInteger(bytesToRead) || bytesToRead < 1) {
    throw new IndexOutOfRangeError(
      `bytesToRead must be a positive integer. Got ${bytesToRead}`,
      "bytesToRead",
      bytesToRead,
    );
  }
}

/** Same as readExactly, without the argument checks. */
function readExactlyUnchecked(
  source: ISyncReadableStream,
  buffer: Uint8Array,
  startIndex: number,
  bytesToRead: number,
): Uint8Array {
  let index = 0;
  while (index < bytesToRead) {
    const read = source.read(buffer, startIndex + index, bytesToRead - index);
    if (read === 0) {
      throw new UnexpectedEndOfStreamError(bytesToRead - index);
    }
    index += read;
  }
  return buffer;
}
