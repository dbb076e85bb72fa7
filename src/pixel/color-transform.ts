import { InvalidArgumentError } from '../core/errors.js';
import type { Pixel } from './argb.js';

/**
 * Cross-color transform coefficients for one tile. Each is a signed 8-bit
 * integer; the transform scales by coefficient / 32.
 */
export interface ColorTransformMultipliers {
  greenToRed: number;
  greenToBlue: number;
  redToBlue: number;
}

function toInt8(v: number): number {
  return (v << 24) >> 24;
}

export function createMultipliers(
  greenToRed: number,
  greenToBlue: number,
  redToBlue: number
): ColorTransformMultipliers {
  for (const [name, v] of [
    ['greenToRed', greenToRed],
    ['greenToBlue', greenToBlue],
    ['redToBlue', redToBlue],
  ] as const) {
    if (!Number.isInteger(v) || v < -128 || v > 127) {
      throw new InvalidArgumentError(
        `${name} must be a signed 8-bit integer, got ${v}`
      );
    }
  }
  return { greenToRed, greenToBlue, redToBlue };
}

/**
 * (int8(coefficient) * int8(channel)) >> 5, sign-extending.
 */
export function colorTransformDelta(coefficient: number, channel: number): number {
  return (toInt8(coefficient) * toInt8(channel)) >> 5;
}

/**
 * Pack multipliers into the tile-map form:
 * 0xff000000 | redToBlue << 16 | greenToBlue << 8 | greenToRed.
 */
export function multipliersToColorCode(m: ColorTransformMultipliers): number {
  return (
    (0xff000000 |
      ((m.redToBlue & 0xff) << 16) |
      ((m.greenToBlue & 0xff) << 8) |
      (m.greenToRed & 0xff)) >>>
    0
  );
}

export function colorCodeToMultipliers(colorCode: number): ColorTransformMultipliers {
  return {
    greenToRed: toInt8(colorCode),
    greenToBlue: toInt8(colorCode >>> 8),
    redToBlue: toInt8(colorCode >>> 16),
  };
}

export function transformColorPixel(m: ColorTransformMultipliers, pixel: Pixel): Pixel {
  const green = (pixel >>> 8) & 0xff;
  const red = (pixel >>> 16) & 0xff;
  const blue = pixel & 0xff;

  const newRed = (red - colorTransformDelta(m.greenToRed, green)) & 0xff;
  const newBlue =
    (blue -
      colorTransformDelta(m.greenToBlue, green) -
      colorTransformDelta(m.redToBlue, red)) &
    0xff;

  return ((pixel & 0xff00ff00) | (newRed << 16) | newBlue) >>> 0;
}

/**
 * Undo transformColorPixel. Red is rebuilt first; blue then uses the
 * rebuilt red, which is the red the forward pass saw.
 */
export function transformColorInversePixel(
  m: ColorTransformMultipliers,
  pixel: Pixel
): Pixel {
  const green = (pixel >>> 8) & 0xff;
  const red = (pixel >>> 16) & 0xff;
  const blue = pixel & 0xff;

  const newRed = (red + colorTransformDelta(m.greenToRed, green)) & 0xff;
  const newBlue =
    (blue +
      colorTransformDelta(m.greenToBlue, green) +
      colorTransformDelta(m.redToBlue, newRed)) &
    0xff;

  return ((pixel & 0xff00ff00) | (newRed << 16) | newBlue) >>> 0;
}

/**
 * Forward cross-color transform, in place.
 */
export function transformColor(
  m: ColorTransformMultipliers,
  pixels: Uint32Array
): Uint32Array {
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = transformColorPixel(m, pixels[i]);
  }
  return pixels;
}

/**
 * Inverse cross-color transform, out of place.
 * @param dst - destination, at least `src.length` long (default: new array)
 */
export function transformColorInverse(
  m: ColorTransformMultipliers,
  src: Uint32Array,
  dst: Uint32Array = new Uint32Array(src.length)
): Uint32Array {
  if (dst.length < src.length) {
    throw new InvalidArgumentError(
      `Destination holds ${dst.length} pixels, need ${src.length}`
    );
  }
  for (let i = 0; i < src.length; i++) {
    dst[i] = transformColorInversePixel(m, src[i]);
  }
  return dst;
}

/**
 * Subtract green from red and blue (mod 256), in place.
 */
export function subtractGreen(pixels: Uint32Array): Uint32Array {
  for (let i = 0; i < pixels.length; i++) {
    const p = pixels[i];
    const green = (p >>> 8) & 0xff;
    const r = (((p >>> 16) & 0xff) - green) & 0xff;
    const b = ((p & 0xff) - green) & 0xff;
    pixels[i] = ((p & 0xff00ff00) | (r << 16) | b) >>> 0;
  }
  return pixels;
}

/**
 * Add green back to red and blue (mod 256), in place. Inverse of subtractGreen.
 */
export function addGreen(pixels: Uint32Array): Uint32Array {
  for (let i = 0; i < pixels.length; i++) {
    const p = pixels[i];
    const green = (p >>> 8) & 0xff;
    const redBlue = ((p & 0x00ff00ff) + green * 0x00010001) & 0x00ff00ff;
    pixels[i] = ((p & 0xff00ff00) | redBlue) >>> 0;
  }
  return pixels;
}
