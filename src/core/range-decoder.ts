import { InvalidArgumentError } from './errors.js';
import { assertProbability } from './range-encoder.js';

/**
 * Binary range decoder, the mirror of RangeEncoder.
 *
 * The value register holds the current 8-bit window plus `bits` look-ahead
 * bits below it. Bytes are pulled in one at a time, only when the window
 * runs dry, so the decoder visits the same renormalization points as the
 * encoder.
 */
export class RangeDecoder {
  private range: number = 255 - 1;
  private value: number = 0;
  private bits: number = -8;
  private data: Uint8Array;
  private position: number = 0;
  private eof: boolean = false;

  constructor(data: Uint8Array) {
    this.data = data;
    this.loadByte();
  }

  /**
   * Decode one bit.
   * @param probability - chance out of 256 that the bit is 0, in [1, 255]
   */
  getBit(probability: number): 0 | 1 {
    assertProbability(probability);

    let range = this.range;
    if (this.bits < 0) {
      this.loadByte();
    }

    const pos = this.bits;
    const split = (range * probability) >> 8;
    const window = this.value >>> pos;

    let bit: 0 | 1;
    if (window > split) {
      bit = 1;
      range -= split;
      this.value -= (split + 1) << pos;
    } else {
      bit = 0;
      range = split + 1;
    }

    // range is now the true width in [1, 255]; shift its top bit to bit 7
    const shift = Math.clz32(range) - 24;
    range <<= shift;
    this.bits -= shift;
    this.range = range - 1;
    return bit;
  }

  /**
   * Read `nBits` bits MSB first, each at probability 128.
   */
  getValue(nBits: number): number {
    if (!Number.isInteger(nBits) || nBits < 0 || nBits > 32) {
      throw new InvalidArgumentError(
        `nBits must be an integer in [0, 32], got ${nBits}`
      );
    }
    let v = 0;
    for (let i = nBits - 1; i >= 0; i--) {
      v = (v | (this.getBit(0x80) << i)) >>> 0;
    }
    return v;
  }

  /**
   * Read a value written by RangeEncoder.putSignedBits.
   */
  getSignedValue(nBits: number): number {
    if (this.getBit(0x80) === 0) {
      return 0;
    }
    const value = this.getValue(nBits);
    return this.getBit(0x80) !== 0 ? -value : value;
  }

  /**
   * Read one sign bit at probability 128 and apply it to `v`.
   */
  getSigned(v: number): number {
    return this.getBit(0x80) !== 0 ? -v : v;
  }

  /**
   * True once a byte past the end of the input had to be read as zero.
   */
  get isEndOfStream(): boolean {
    return this.eof;
  }

  /**
   * Bytes consumed from the input so far.
   */
  get bytesConsumed(): number {
    return this.position;
  }

  private loadByte(): void {
    if (this.position < this.data.length) {
      this.value = (this.value << 8) | this.data[this.position++];
    } else {
      this.value <<= 8;
      this.eof = true;
    }
    this.bits += 8;
  }
}
