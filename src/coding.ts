import { BitInputStream, BitOutputStream } from './core/bit-stream.js';
import type { CoderOptions } from './core/byte-buffer.js';
import { InvalidArgumentError, TruncatedInputError } from './core/errors.js';
import { RangeDecoder } from './core/range-decoder.js';
import { RangeEncoder } from './core/range-encoder.js';

/**
 * One binary decision and the probability (out of 256) that it is 0.
 */
export interface Decision {
  bit: 0 | 1;
  probability: number;
}

/**
 * One fixed-width field for the bit packer.
 */
export interface Field {
  value: number;
  nBits: number;
}

/**
 * Result of range coding a decision sequence.
 */
export interface CodingResult {
  /** Finished range-coded stream */
  data: Uint8Array;

  /** Number of decisions coded */
  decisionCount: number;

  /** Length of `data` */
  byteLength: number;

  /** Average output bits per decision (0 for an empty sequence) */
  bitsPerDecision: number;
}

/**
 * Result of packing a field sequence.
 */
export interface PackResult {
  /** Packed bytes, zero-padded in the last byte */
  data: Uint8Array;

  /** Exact number of meaningful bits; padding is indistinguishable from data */
  bitCount: number;
}

/**
 * Range code a whole decision sequence.
 */
export function encodeDecisions(
  decisions: readonly Decision[],
  options: CoderOptions = {}
): CodingResult {
  const encoder = new RangeEncoder(options);
  try {
    for (const { bit, probability } of decisions) {
      encoder.putBit(bit, probability);
    }
  } catch (err) {
    encoder.abort();
    throw err;
  }

  const data = encoder.finish();
  return {
    data,
    decisionCount: decisions.length,
    byteLength: data.length,
    bitsPerDecision: decisions.length === 0 ? 0 : (data.length * 8) / decisions.length,
  };
}

/**
 * Decode one decision per probability.
 * @throws TruncatedInputError if the stream ended before the last decision
 */
export function decodeDecisions(
  data: Uint8Array,
  probabilities: readonly number[]
): (0 | 1)[] {
  const decoder = new RangeDecoder(data);
  const bits = probabilities.map((probability) => decoder.getBit(probability));
  if (decoder.isEndOfStream) {
    throw new TruncatedInputError(
      `Range-coded stream of ${data.length} bytes ended before decision ${probabilities.length}`
    );
  }
  return bits;
}

/**
 * Pack fields LSB-first.
 */
export function packFields(
  fields: readonly Field[],
  options: CoderOptions = {}
): PackResult {
  const stream = new BitOutputStream(options);
  try {
    for (const { value, nBits } of fields) {
      stream.putBits(value, nBits);
    }
  } catch (err) {
    stream.abort();
    throw err;
  }

  const bitCount = stream.bitCount;
  return { data: stream.finish(), bitCount };
}

/**
 * Read back one field per width.
 * @throws TruncatedInputError if the widths add up to more bits than `data` holds
 */
export function unpackFields(data: Uint8Array, widths: readonly number[]): number[] {
  const stream = new BitInputStream(data);
  const values = widths.map((nBits) => stream.readBits(nBits));

  if (stream.isEndOfStream) {
    const requested = widths.reduce((sum, w) => sum + w, 0);
    throw new TruncatedInputError(
      `Requested ${requested} bits from ${data.length} bytes (${data.length * 8} bits)`
    );
  }

  const unread = stream.bitsRemaining >> 3;
  if (unread > 0) {
    console.warn(`unpackFields: ${unread} trailing byte(s) left unread`);
  }
  return values;
}

/**
 * Split a value wider than one packer call into 16-bit halves, low first.
 */
export function splitWideField(value: number, nBits: number): Field[] {
  if (!Number.isInteger(nBits) || nBits < 0 || nBits > 32) {
    throw new InvalidArgumentError(`nBits must be an integer in [0, 32], got ${nBits}`);
  }
  if (nBits <= 16) {
    return [{ value, nBits }];
  }
  return [
    { value: value & 0xffff, nBits: 16 },
    { value: Math.floor(value / 0x10000) & 0xffff, nBits: nBits - 16 },
  ];
}
