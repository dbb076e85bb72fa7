/**
 * Packed ARGB pixel arithmetic.
 *
 * A pixel is an unsigned 32-bit number: alpha in bits 31-24, red 23-16,
 * green 15-8, blue 7-0. Every helper works on all four byte lanes at once
 * and wraps mod 256 per lane; results are always normalized with `>>> 0`.
 */

export type Pixel = number;

/** Opaque black, the mode-0 prediction */
export const ARGB_BLACK: Pixel = 0xff000000;

export function argb(a: number, r: number, g: number, b: number): Pixel {
  return (((a & 0xff) << 24) | ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff)) >>> 0;
}

export function alphaOf(p: Pixel): number {
  return p >>> 24;
}

export function redOf(p: Pixel): number {
  return (p >>> 16) & 0xff;
}

export function greenOf(p: Pixel): number {
  return (p >>> 8) & 0xff;
}

export function blueOf(p: Pixel): number {
  return p & 0xff;
}

/**
 * Lane-wise floor average without overflow.
 * average2(0x00000000, 0xffffffff) === 0x7f7f7f7f
 */
export function average2(a: Pixel, b: Pixel): Pixel {
  return ((((a ^ b) & 0xfefefefe) >>> 1) + (a & b)) >>> 0;
}

export function average3(a: Pixel, b: Pixel, c: Pixel): Pixel {
  return average2(average2(a, c), b);
}

export function average4(a: Pixel, b: Pixel, c: Pixel, d: Pixel): Pixel {
  return average2(average2(a, b), average2(c, d));
}

/**
 * Lane-wise a + b mod 256.
 */
export function addPixels(a: Pixel, b: Pixel): Pixel {
  const alphaAndGreen = (a & 0xff00ff00) + (b & 0xff00ff00);
  const redAndBlue = (a & 0x00ff00ff) + (b & 0x00ff00ff);
  return ((alphaAndGreen & 0xff00ff00) | (redAndBlue & 0x00ff00ff)) >>> 0;
}

/**
 * Lane-wise a - b mod 256. The bias constants keep a borrow from leaking
 * into the neighboring lane.
 */
export function subPixels(a: Pixel, b: Pixel): Pixel {
  const alphaAndGreen = 0x00ff00ff + (a & 0xff00ff00) - (b & 0xff00ff00);
  const redAndBlue = 0xff00ff00 + (a & 0x00ff00ff) - (b & 0x00ff00ff);
  return ((alphaAndGreen & 0xff00ff00) | (redAndBlue & 0x00ff00ff)) >>> 0;
}

/**
 * Saturate to [0, 255]. Negative inputs wrap to large unsigned values,
 * whose complement has a zero top byte.
 */
export function clip255(x: number): number {
  const u = x >>> 0;
  return u < 256 ? u : ~u >>> 24;
}
