import { ByteBuffer, type CoderOptions } from './byte-buffer.js';
import {
  CapacityExceededError,
  InvalidArgumentError,
  InvalidStateError,
} from './errors.js';

/**
 * Widest field a single putBits/readBits call accepts. Seven pending bits
 * plus 24 new ones still fit the 32-bit accumulator.
 */
export const MAX_BITS_PER_CALL = 24;

function assertBitCount(nBits: number): void {
  if (!Number.isInteger(nBits) || nBits < 0 || nBits > MAX_BITS_PER_CALL) {
    throw new InvalidArgumentError(
      `nBits must be an integer in [0, ${MAX_BITS_PER_CALL}], got ${nBits}`
    );
  }
}

function bitMask(nBits: number): number {
  return nBits === 0 ? 0 : (0xffffffff >>> (32 - nBits));
}

/**
 * Bit-level output stream for pre-computed codes (Huffman codewords,
 * extra bits). No entropy coding: values are packed LSB-first.
 *
 * Bits go to increasing byte addresses; within a byte, LSB first.
 * Example: 3 bits 'RRR' -> BYTE-0: 0000 0RRR
 * then 5 bits 'SSSSS'  -> BYTE-0: SSSS SRRR
 */
export class BitOutputStream {
  private accumulator: number = 0;
  private used: number = 0;
  private output: ByteBuffer;
  private finished: boolean = false;
  private failure: CapacityExceededError | null = null;

  constructor(options: CoderOptions = {}) {
    this.output = new ByteBuffer(options);
  }

  /**
   * Append the low `nBits` bits of `value`.
   * @param value - unsigned value; bits above `nBits` are ignored
   * @param nBits - field width (0-24)
   */
  putBits(value: number, nBits: number): void {
    this.ensureOpen();
    assertBitCount(nBits);
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidArgumentError(
        `Value must be a non-negative integer, got ${value}`
      );
    }
    if (nBits === 0 || this.failure) return;

    this.accumulator = (this.accumulator | ((value & bitMask(nBits)) << this.used)) >>> 0;
    this.used += nBits;

    while (this.used >= 8) {
      this.emit(this.accumulator & 0xff);
      this.accumulator >>>= 8;
      this.used -= 8;
    }
  }

  /**
   * Pad the final partial byte with zeros and hand the bytes to the caller.
   * Throws the recorded CapacityExceededError if the budget was exceeded.
   */
  finish(): Uint8Array {
    this.ensureOpen();
    if (this.used > 0) {
      this.emit(this.accumulator & 0xff);
      this.accumulator = 0;
      this.used = 0;
    }
    if (this.failure) {
      const failure = this.failure;
      this.abort();
      throw failure;
    }

    const bytes = this.output.toUint8Array();
    this.output.release();
    this.finished = true;
    return bytes;
  }

  /**
   * Discard the output and release the buffer.
   */
  abort(): void {
    this.output.release();
    this.accumulator = 0;
    this.used = 0;
    this.finished = true;
  }

  /**
   * Total bits written, including the pending partial byte.
   */
  get bitCount(): number {
    return this.output.size * 8 + this.used;
  }

  /**
   * Bytes the stream will occupy once finished.
   */
  get byteLength(): number {
    return this.output.size + (this.used > 0 ? 1 : 0);
  }

  /** True once the size budget has been exceeded */
  get hasError(): boolean {
    return this.failure !== null;
  }

  get error(): CapacityExceededError | null {
    return this.failure;
  }

  private emit(byte: number): void {
    if (this.failure) return;
    if (!this.output.push(byte)) {
      this.failure = new CapacityExceededError(this.output.maxSize);
    }
  }

  private ensureOpen(): void {
    if (this.finished) {
      throw new InvalidStateError('Bit stream already finished');
    }
  }
}

/**
 * Bit-level input stream, the mirror of BitOutputStream.
 *
 * Reading past the end does not throw: missing bits read as zero and
 * `isEndOfStream` latches, so the caller decides whether that is corruption.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private accumulator: number = 0;
  private available: number = 0;
  private consumed: number = 0;
  private eos: boolean = false;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read an unsigned field of `nBits` bits (0-24).
   */
  readBits(nBits: number): number {
    const value = this.peekBits(nBits);
    this.accumulator >>>= nBits;
    this.available -= nBits;
    this.consumed += nBits;
    if (this.consumed > this.data.length * 8) {
      this.eos = true;
    }
    return value;
  }

  /**
   * Look at the next `nBits` bits without consuming them. Bits past the end
   * of the data read as zero.
   */
  peekBits(nBits: number): number {
    assertBitCount(nBits);
    this.fill(nBits);
    return (this.accumulator & bitMask(nBits)) >>> 0;
  }

  /**
   * Advance past `nBits` bits (0-24).
   */
  skipBits(nBits: number): void {
    this.readBits(nBits);
  }

  /**
   * True once a read has consumed any bit past the end of the data.
   */
  get isEndOfStream(): boolean {
    return this.eos;
  }

  /**
   * Bits consumed so far.
   */
  get bitPosition(): number {
    return this.consumed;
  }

  /**
   * Bits left before the end of the data.
   */
  get bitsRemaining(): number {
    return Math.max(0, this.data.length * 8 - this.consumed);
  }

  private fill(nBits: number): void {
    while (this.available < nBits) {
      if (this.bytePosition < this.data.length) {
        this.accumulator =
          (this.accumulator | (this.data[this.bytePosition++] << this.available)) >>> 0;
      }
      this.available += 8;
    }
  }
}
