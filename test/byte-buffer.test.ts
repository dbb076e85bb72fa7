import { describe, it, expect } from 'vitest';
import { ByteBuffer, DEFAULT_CODER_OPTIONS } from '../src/core/byte-buffer.js';
import { CodecError, InvalidArgumentError } from '../src/core/errors.js';

describe('ByteBuffer', () => {
  it('should grow past its initial capacity', () => {
    const buffer = new ByteBuffer({ capacityHint: 2 });
    for (let i = 0; i < 10; i++) {
      expect(buffer.push(i)).toBe(true);
    }

    expect(buffer.size).toBe(10);
    expect(Array.from(buffer.toUint8Array())).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('should refuse bytes beyond the budget', () => {
    const buffer = new ByteBuffer({ capacityHint: 1, maxSize: 3 });

    expect([1, 2, 3, 4].map((b) => buffer.push(b))).toEqual([true, true, true, false]);
    expect(Array.from(buffer.toUint8Array())).toEqual([1, 2, 3]);
  });

  it('should wrap the last byte on increment', () => {
    const buffer = new ByteBuffer();
    buffer.push(0x7f);
    buffer.incrementLast();
    buffer.push(0xff);
    buffer.incrementLast();

    expect(Array.from(buffer.toUint8Array())).toEqual([0x80, 0x00]);
  });

  it('should default to an unbounded budget', () => {
    expect(new ByteBuffer().maxSize).toBe(DEFAULT_CODER_OPTIONS.maxSize);
    expect(DEFAULT_CODER_OPTIONS.maxSize).toBe(Infinity);
  });

  it('should reject invalid options', () => {
    expect(() => new ByteBuffer({ capacityHint: -1 })).toThrow(InvalidArgumentError);
    expect(() => new ByteBuffer({ maxSize: 1.5 })).toThrow(InvalidArgumentError);
  });

  it('should be unusable after release', () => {
    const buffer = new ByteBuffer({ capacityHint: 1 });
    buffer.release();

    expect(buffer.size).toBe(0);
    expect(() => buffer.push(1)).toThrow(CodecError);
  });
});
