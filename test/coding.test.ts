import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  type Decision,
  decodeDecisions,
  encodeDecisions,
  packFields,
  splitWideField,
  unpackFields,
} from '../src/coding.js';
import {
  CapacityExceededError,
  InvalidArgumentError,
  TruncatedInputError,
} from '../src/core/errors.js';
import { createRandom, randomInt } from './helpers/random.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('encodeDecisions/decodeDecisions', () => {
  const scenario: Decision[] = [
    { bit: 1, probability: 128 },
    { bit: 0, probability: 128 },
    { bit: 1, probability: 128 },
    { bit: 1, probability: 128 },
    { bit: 0, probability: 128 },
  ];

  it('should report the coded size', () => {
    const result = encodeDecisions(scenario);

    expect(Array.from(result.data)).toEqual([0xaf, 0xa0, 0x00]);
    expect(result.decisionCount).toBe(5);
    expect(result.byteLength).toBe(3);
    expect(result.bitsPerDecision).toBeCloseTo(4.8);
  });

  it('should report zero bits per decision for an empty sequence', () => {
    const result = encodeDecisions([]);

    expect(Array.from(result.data)).toEqual([0x00, 0x00]);
    expect(result.bitsPerDecision).toBe(0);
  });

  it('should decode what it encoded', () => {
    const random = createRandom(31);
    const decisions: Decision[] = Array.from({ length: 500 }, (): Decision => ({
      bit: random() < 0.3 ? 1 : 0,
      probability: randomInt(random, 1, 255),
    }));

    const { data } = encodeDecisions(decisions);
    const bits = decodeDecisions(
      data,
      decisions.map((d) => d.probability)
    );
    expect(bits).toEqual(decisions.map((d) => d.bit));
  });

  it('should propagate argument and budget errors', () => {
    expect(() => encodeDecisions([{ bit: 0, probability: 0 }])).toThrow(InvalidArgumentError);

    const many: Decision[] = Array.from({ length: 200 }, (_, i): Decision => ({
      bit: i % 3 === 0 ? 1 : 0,
      probability: 128,
    }));
    expect(() => encodeDecisions(many, { maxSize: 4 })).toThrow(CapacityExceededError);
  });

  it('should reject a stream that ends too early', () => {
    expect(() => decodeDecisions(new Uint8Array(0), [128])).toThrow(TruncatedInputError);
  });
});

describe('packFields/unpackFields', () => {
  it('should pack fields and report the bit count', () => {
    const result = packFields([
      { value: 5, nBits: 3 },
      { value: 3, nBits: 2 },
    ]);

    expect(Array.from(result.data)).toEqual([0x1d]);
    expect(result.bitCount).toBe(5);
  });

  it('should unpack without warning when only padding is left', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(unpackFields(new Uint8Array([0x1d]), [3, 2])).toEqual([5, 3]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn about whole trailing bytes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(unpackFields(new Uint8Array([1, 2, 3]), [8])).toEqual([1]);
    expect(warn).toHaveBeenCalledWith('unpackFields: 2 trailing byte(s) left unread');
  });

  it('should reject widths that run past the data', () => {
    expect(() => unpackFields(new Uint8Array([0x0f]), [12])).toThrow(TruncatedInputError);
  });

  it('should propagate argument and budget errors from the packer', () => {
    expect(() => packFields([{ value: 1, nBits: 25 }])).toThrow(InvalidArgumentError);
    expect(() => packFields([{ value: 0xffff, nBits: 16 }], { maxSize: 1 })).toThrow(
      CapacityExceededError
    );
  });
});

describe('splitWideField', () => {
  it('should leave fields of 16 bits or fewer alone', () => {
    expect(splitWideField(0xabc, 12)).toEqual([{ value: 0xabc, nBits: 12 }]);
  });

  it('should split wide values low half first', () => {
    expect(splitWideField(0x12345678, 32)).toEqual([
      { value: 0x5678, nBits: 16 },
      { value: 0x1234, nBits: 16 },
    ]);
    expect(splitWideField(0x1abcd, 17)).toEqual([
      { value: 0xabcd, nBits: 16 },
      { value: 0x1, nBits: 1 },
    ]);
  });

  it('should round trip a 32-bit value through the packer', () => {
    const fields = splitWideField(0xdeadbeef, 32);
    const { data } = packFields(fields);
    const [low, high] = unpackFields(
      data,
      fields.map((f) => f.nBits)
    );

    expect((high * 0x10000 + low) >>> 0).toBe(0xdeadbeef);
  });

  it('should reject widths above 32', () => {
    expect(() => splitWideField(0, 33)).toThrow(InvalidArgumentError);
  });
});
