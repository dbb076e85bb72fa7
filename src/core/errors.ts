/**
 * Error types raised by the coders and pixel transforms.
 *
 * Every component reports to its immediate caller and never retries.
 */

/**
 * Base class for all errors thrown by this package.
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

/**
 * A caller broke an argument contract (probability 0, nBits > 24, bad mode...).
 * Values are never clamped.
 */
export class InvalidArgumentError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The output buffer hit its size budget. Recorded when it happens and thrown
 * from `finish()`.
 */
export class CapacityExceededError extends CodecError {
  readonly maxSize: number;

  constructor(maxSize: number) {
    super(`Output exceeds the size budget of ${maxSize} bytes`);
    this.name = 'CapacityExceededError';
    this.maxSize = maxSize;
  }
}

/**
 * A decoder or reader needed bytes past the end of its input.
 */
export class TruncatedInputError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = 'TruncatedInputError';
  }
}

/**
 * A coder was used after `finish()` or `abort()`.
 */
export class InvalidStateError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}
