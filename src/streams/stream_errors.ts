/**
 * Error types raised by the stream transfer helpers and the bundled stream
 * implementations.
 */

/**
 * Error thrown when a required argument is absent or has an unusable value.
 */
export class InvalidArgumentError extends Error {
  /** The name of the offending argument. */
  public readonly argumentName: string;

  /**
   * Creates a new InvalidArgumentError.
   * @param message The error message.
   * @param argumentName The name of the offending argument.
   */
  constructor(message: string, argumentName: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argumentName = argumentName;
  }
}

/**
 * Error thrown when an index or count places a window outside buffer bounds.
 */
export class IndexOutOfRangeError extends RangeError {
  /** The name of the offending argument. */
  public readonly argumentName: string;
  /** The value that was rejected. */
  public readonly actualValue: number;

  /**
   * Creates a new IndexOutOfRangeError.
   * @param message The error message.
   * @param argumentName The name of the offending argument.
   * @param actualValue The value that was rejected.
   */
  constructor(message: string, argumentName: string, actualValue: number) {
    super(message);
    this.name = "IndexOutOfRangeError";
    this.argumentName = argumentName;
    this.actualValue = actualValue;
  }
}

/**
 * Error thrown when a source runs dry before an exact-length read completes.
 */
export class UnexpectedEndOfStreamError extends Error {
  /** How many bytes were still outstanding. */
  public readonly bytesRemaining: number;

  constructor(bytesRemaining: number) {
    super(
      `End of stream reached with ${bytesRemaining} byte${
        bytesRemaining === 1 ? "" : "s"
      } left to read.`,
    );
    this.name = "UnexpectedEndOfStreamError";
    this.bytesRemaining = bytesRemaining;
  }
}
