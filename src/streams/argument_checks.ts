import { IndexOutOfRangeError, InvalidArgumentError } from "./stream_errors.ts";

/**
 * Throws an InvalidArgumentError when `value` is null or undefined.
 */
export function assertPresent(value: unknown, argumentName: string): void {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(
      `${argumentName} must not be null or undefined`,
      argumentName,
    );
  }
}

/**
 * Validates an `offset`/`count` window over `buffer`, as passed to
 * `read`/`write` implementations.
 */
export function assertWindow(
  buffer: Uint8Array,
  offset: number,
  count: number,
): void {
  assertPresent(buffer, "buffer");
  if (!Number.isInteger(offset) || offset < 0 || offset > buffer.length) {
    throw new IndexOutOfRangeError(
      `offset must be within [0, ${buffer.length}]. Got offset=${offset}`,
      "offset",
      offset,
    );
  }
  if (!Number.isInteger(count) || count < 0 || offset + count > buffer.length) {
    throw new IndexOutOfRangeError(
      `count exceeds buffer bounds. offset=${offset}, count=${count}, bufferLength=${buffer.length}`,
      "count",
      count,
    );
  }
}

/**
 * Resolves a caller-supplied transfer buffer, or allocates one of the given
 * size.
 */
export function resolveTransferBuffer(
  bufferOrSize: number | Uint8Array,
): Uint8Array {
  if (typeof bufferOrSize === "number") {
    if (!Number.isInteger(bufferOrSize) || bufferOrSize < 1) {
      throw new InvalidArgumentError(
        `bufferSize must be a positive integer. Got ${bufferOrSize}`,
        "bufferSize",
      );
    }
    return new Uint8Array(bufferOrSize);
  }
  assertPresent(bufferOrSize, "buffer");
  if (bufferOrSize.length === 0) {
    throw new InvalidArgumentError("Buffer has length of 0", "buffer");
  }
  return bufferOrSize;
}
