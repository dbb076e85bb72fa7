import { CodecError, InvalidArgumentError } from './errors.js';

/**
 * Options shared by RangeEncoder and BitOutputStream.
 */
export interface CoderOptions {
  /** Initial buffer size in bytes (default: 1024) */
  capacityHint?: number;

  /** Largest output the writer may produce, in bytes (default: unbounded) */
  maxSize?: number;
}

export const DEFAULT_CODER_OPTIONS: Required<CoderOptions> = {
  capacityHint: 1024,
  maxSize: Infinity,
};

/**
 * Growable output buffer with an optional size budget.
 * Writers own one until they finish or abort.
 */
export class ByteBuffer {
  private bytes: Uint8Array;
  private length: number = 0;
  readonly maxSize: number;

  constructor(options: CoderOptions = {}) {
    const { capacityHint, maxSize } = { ...DEFAULT_CODER_OPTIONS, ...options };

    if (!Number.isInteger(capacityHint) || capacityHint < 0) {
      throw new InvalidArgumentError(
        `capacityHint must be a non-negative integer, got ${capacityHint}`
      );
    }
    if (maxSize !== Infinity && (!Number.isInteger(maxSize) || maxSize < 0)) {
      throw new InvalidArgumentError(
        `maxSize must be a non-negative integer or Infinity, got ${maxSize}`
      );
    }

    this.maxSize = maxSize;
    this.bytes = new Uint8Array(Math.max(1, Math.min(capacityHint, maxSize)));
  }

  /**
   * Append one byte. Returns false, leaving the buffer unchanged, when the
   * byte would exceed the budget.
   */
  push(byte: number): boolean {
    if (this.length >= this.maxSize) {
      return false;
    }
    if (this.length === this.bytes.length) {
      this.grow();
    }
    this.bytes[this.length++] = byte & 0xff;
    return true;
  }

  /**
   * Add one to the last byte written (carry out of the range coder's value).
   */
  incrementLast(): void {
    if (this.length > 0) {
      this.bytes[this.length - 1] = (this.bytes[this.length - 1] + 1) & 0xff;
    }
  }

  get size(): number {
    return this.length;
  }

  /**
   * Copy out the bytes written so far.
   */
  toUint8Array(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }

  /**
   * Drop the storage. The buffer is unusable afterwards.
   */
  release(): void {
    this.bytes = new Uint8Array(0);
    this.length = 0;
  }

  private grow(): void {
    if (this.bytes.length === 0) {
      throw new CodecError('Buffer has been released');
    }
    const newSize = Math.min(this.bytes.length * 2, this.maxSize);
    const newBytes = new Uint8Array(newSize);
    newBytes.set(this.bytes);
    this.bytes = newBytes;
  }
}
