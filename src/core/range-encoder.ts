import { ByteBuffer, type CoderOptions } from './byte-buffer.js';
import {
  CapacityExceededError,
  InvalidArgumentError,
  InvalidStateError,
} from './errors.js';

/**
 * Range is stored minus one, so the canonical band [128, 255] becomes
 * [127, 254]. Renormalization happens whenever it drops below RANGE_MIN.
 */
const INITIAL_RANGE = 255 - 1;
const RANGE_MIN = 127;

/**
 * Left shift that brings a range back into the canonical band.
 * `range` is the stored (minus one) value, in [0, 126].
 */
export function normShift(range: number): number {
  return Math.clz32(range + 1) - 24;
}

export function assertBit(bit: number): asserts bit is 0 | 1 {
  if (bit !== 0 && bit !== 1) {
    throw new InvalidArgumentError(`Bit must be 0 or 1, got ${bit}`);
  }
}

export function assertProbability(probability: number): void {
  if (!Number.isInteger(probability) || probability < 1 || probability > 255) {
    throw new InvalidArgumentError(
      `Probability must be an integer in [1, 255], got ${probability}`
    );
  }
}

type CoderState = 'open' | 'finished' | 'aborted';

/**
 * Binary range encoder (the boolean coder of the lossy format).
 *
 * Each call narrows the current interval by a caller-supplied probability
 * that the bit is 0. Bytes equal to 0xff are held back as a run until the
 * next byte settles whether a carry rippled into them, so the value register
 * never grows past a couple of bytes.
 */
export class RangeEncoder {
  private range: number = INITIAL_RANGE;
  private value: number = 0;
  private run: number = 0;
  private nbBits: number = -8;
  private output: ByteBuffer;
  private state: CoderState = 'open';
  private failure: CapacityExceededError | null = null;

  constructor(options: CoderOptions = {}) {
    this.output = new ByteBuffer(options);
  }

  /**
   * Encode one bit.
   * @param probability - chance out of 256 that the bit is 0, in [1, 255]
   * @returns the bit, unchanged
   */
  putBit(bit: number, probability: number): 0 | 1 {
    this.ensureOpen();
    assertBit(bit);
    assertProbability(probability);
    if (this.failure) return bit;

    const split = (this.range * probability) >> 8;
    if (bit !== 0) {
      this.value += split + 1;
      this.range -= split + 1;
    } else {
      this.range = split;
    }
    this.renormalize();
    return bit;
  }

  /**
   * Encode one bit at probability 128.
   */
  putBitUniform(bit: number): 0 | 1 {
    return this.putBit(bit, 128);
  }

  /**
   * Encode the low `nBits` bits of `value`, MSB first, at probability 128.
   */
  putBits(value: number, nBits: number): void {
    if (!Number.isInteger(nBits) || nBits < 0 || nBits > 32) {
      throw new InvalidArgumentError(
        `nBits must be an integer in [0, 32], got ${nBits}`
      );
    }
    for (let i = nBits - 1; i >= 0; i--) {
      this.putBitUniform((value >>> i) & 1);
    }
  }

  /**
   * Encode a signed value: a non-zero flag, then the magnitude in `nBits`
   * bits followed by the sign.
   */
  putSignedBits(value: number, nBits: number): void {
    if (!Number.isInteger(nBits) || nBits < 0 || nBits > 31) {
      throw new InvalidArgumentError(
        `nBits must be an integer in [0, 31], got ${nBits}`
      );
    }
    if (!Number.isInteger(value) || Math.abs(value) >= 2 ** nBits) {
      throw new InvalidArgumentError(
        `Magnitude of ${value} does not fit in ${nBits} bits`
      );
    }
    if (this.putBitUniform(value !== 0 ? 1 : 0) === 0) {
      return;
    }
    if (value < 0) {
      this.putBits(((-value << 1) | 1) >>> 0, nBits + 1);
    } else {
      this.putBits((value << 1) >>> 0, nBits + 1);
    }
  }

  /**
   * Flush every pending bit and hand the encoded bytes to the caller.
   * Throws the recorded CapacityExceededError if the budget was exceeded.
   */
  finish(): Uint8Array {
    this.ensureOpen();
    if (!this.failure) {
      // The final byte is 0 or 1, which releases any held-back 0xff run.
      this.putBits(0, 9 - this.nbBits);
      this.nbBits = 0;
      this.flush();
    }
    if (this.failure) {
      const failure = this.failure;
      this.abort();
      throw failure;
    }

    const bytes = this.output.toUint8Array();
    this.output.release();
    this.state = 'finished';
    return bytes;
  }

  /**
   * Discard the output and release the buffer.
   */
  abort(): void {
    this.output.release();
    this.state = 'aborted';
  }

  /** True once the size budget has been exceeded */
  get hasError(): boolean {
    return this.failure !== null;
  }

  get error(): CapacityExceededError | null {
    return this.failure;
  }

  /**
   * Approximate write position in bits.
   */
  get bitPosition(): number {
    return (this.output.size + this.run) * 8 + 8 + this.nbBits;
  }

  /**
   * Bytes emitted so far, not counting held-back 0xff bytes.
   */
  get byteLength(): number {
    return this.output.size;
  }

  private renormalize(): void {
    if (this.range >= RANGE_MIN) return;

    const shift = normShift(this.range);
    this.range = ((this.range + 1) << shift) - 1;
    this.value <<= shift;
    this.nbBits += shift;
    if (this.nbBits > 0) {
      this.flush();
    }
  }

  /**
   * Move one byte out of the value register.
   */
  private flush(): void {
    const s = 8 + this.nbBits;
    const bits = this.value >> s;
    this.value -= bits << s;
    this.nbBits -= 8;

    if ((bits & 0xff) === 0xff) {
      this.run++;
      return;
    }

    const carry = (bits & 0x100) !== 0;
    if (carry) {
      this.output.incrementLast();
    }
    const runByte = carry ? 0x00 : 0xff;
    for (; this.run > 0; this.run--) {
      this.emit(runByte);
    }
    this.emit(bits & 0xff);
  }

  private emit(byte: number): void {
    if (this.failure) return;
    if (!this.output.push(byte)) {
      this.failure = new CapacityExceededError(this.output.maxSize);
    }
  }

  private ensureOpen(): void {
    if (this.state !== 'open') {
      throw new InvalidStateError(`Encoder already ${this.state}`);
    }
  }
}
