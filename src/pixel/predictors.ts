import { InvalidArgumentError } from '../core/errors.js';
import {
  type Pixel,
  ARGB_BLACK,
  average2,
  average3,
  average4,
  clip255,
} from './argb.js';

/**
 * The 14 spatial predictors of the lossless format.
 */
export const PredictorMode = {
  Black: 0,
  Left: 1,
  Top: 2,
  TopRight: 3,
  TopLeft: 4,
  AverageLeftTopTopRight: 5,
  AverageLeftTopLeft: 6,
  AverageLeftTop: 7,
  AverageTopLeftTop: 8,
  AverageTopTopRight: 9,
  AverageAll: 10,
  Select: 11,
  ClampedAddSubtractFull: 12,
  ClampedAddSubtractHalf: 13,
} as const;

export type PredictorMode = (typeof PredictorMode)[keyof typeof PredictorMode];

export const NUM_PREDICTOR_MODES = 14;

const PREDICTOR_MODES: readonly PredictorMode[] = Object.values(PredictorMode);

/**
 * Already-reconstructed neighbors of the pixel being predicted.
 */
export interface Neighbors {
  left: Pixel;
  top: Pixel;
  topLeft: Pixel;
  topRight: Pixel;
}

/**
 * Validate a raw mode number (e.g. read from a tile map).
 */
export function toPredictorMode(mode: number): PredictorMode {
  const found = PREDICTOR_MODES.find((m) => m === mode);
  if (found === undefined) {
    throw new InvalidArgumentError(
      `Predictor mode must be an integer in [0, 13], got ${mode}`
    );
  }
  return found;
}

/**
 * Gradient select: returns `top` when, summed over the four lanes,
 * |top - topLeft| - |left - topLeft| <= 0, otherwise `left`.
 */
export function select(top: Pixel, left: Pixel, topLeft: Pixel): Pixel {
  let sum = 0;
  for (let shift = 0; shift < 32; shift += 8) {
    const t = (top >>> shift) & 0xff;
    const l = (left >>> shift) & 0xff;
    const tl = (topLeft >>> shift) & 0xff;
    sum += Math.abs(t - tl) - Math.abs(l - tl);
  }
  return sum <= 0 ? top : left;
}

/**
 * clip255(a + b - c) on each lane.
 */
export function clampedAddSubtractFull(a: Pixel, b: Pixel, c: Pixel): Pixel {
  let result = 0;
  for (let shift = 0; shift < 32; shift += 8) {
    const va = (a >>> shift) & 0xff;
    const vb = (b >>> shift) & 0xff;
    const vc = (c >>> shift) & 0xff;
    result |= clip255(va + vb - vc) << shift;
  }
  return result >>> 0;
}

/**
 * clip255(a + (a - c) / 2) on each lane, `a` being an already averaged pair.
 * The halving truncates toward zero.
 */
export function clampedAddSubtractHalf(avg: Pixel, c: Pixel): Pixel {
  let result = 0;
  for (let shift = 0; shift < 32; shift += 8) {
    const va = (avg >>> shift) & 0xff;
    const vc = (c >>> shift) & 0xff;
    result |= clip255(va + (((va - vc) / 2) | 0)) << shift;
  }
  return result >>> 0;
}

/**
 * Predict a pixel from explicit neighbors.
 */
export function predictNeighbors(mode: PredictorMode, n: Neighbors): Pixel {
  switch (mode) {
    case PredictorMode.Black:
      return ARGB_BLACK;
    case PredictorMode.Left:
      return n.left >>> 0;
    case PredictorMode.Top:
      return n.top >>> 0;
    case PredictorMode.TopRight:
      return n.topRight >>> 0;
    case PredictorMode.TopLeft:
      return n.topLeft >>> 0;
    case PredictorMode.AverageLeftTopTopRight:
      return average3(n.left, n.top, n.topRight);
    case PredictorMode.AverageLeftTopLeft:
      return average2(n.left, n.topLeft);
    case PredictorMode.AverageLeftTop:
      return average2(n.left, n.top);
    case PredictorMode.AverageTopLeftTop:
      return average2(n.topLeft, n.top);
    case PredictorMode.AverageTopTopRight:
      return average2(n.top, n.topRight);
    case PredictorMode.AverageAll:
      return average4(n.left, n.topLeft, n.top, n.topRight);
    case PredictorMode.Select:
      return select(n.top, n.left, n.topLeft);
    case PredictorMode.ClampedAddSubtractFull:
      return clampedAddSubtractFull(n.left, n.top, n.topLeft);
    case PredictorMode.ClampedAddSubtractHalf:
      return clampedAddSubtractHalf(average2(n.left, n.top), n.topLeft);
    default: {
      const unreachable: never = mode;
      throw new InvalidArgumentError(`Unknown predictor mode: ${unreachable}`);
    }
  }
}

/**
 * Predict the pixel at column `x` of the current row.
 *
 * `topRow` is the reconstructed row above: topRow[x - 1] is the top-left
 * neighbor, topRow[x] the top one, topRow[x + 1] the top-right one. The
 * caller guarantees those indices exist for the modes that read them.
 */
export function predict(
  mode: PredictorMode,
  left: Pixel,
  topRow: ArrayLike<number>,
  x: number
): Pixel {
  return predictNeighbors(mode, {
    left,
    top: topRow[x],
    topLeft: topRow[x - 1],
    topRight: topRow[x + 1],
  });
}
