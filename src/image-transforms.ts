/**
 * Whole-image application of the predictor and color transforms.
 *
 * The image is cut into square tiles of (1 << bits) pixels. A tile map
 * holds one 32-bit entry per tile: the predictor mode sits in the green
 * byte, the color multipliers are stored as a color code.
 */

import { InvalidArgumentError } from './core/errors.js';
import { type Pixel, ARGB_BLACK, addPixels, subPixels } from './pixel/argb.js';
import {
  colorCodeToMultipliers,
  transformColorInversePixel,
  transformColorPixel,
  subtractGreen,
  addGreen,
} from './pixel/color-transform.js';
import {
  type PredictorMode,
  predictNeighbors,
  toPredictorMode,
} from './pixel/predictors.js';

export const MIN_TRANSFORM_BITS = 2;
export const MAX_TRANSFORM_BITS = 9;

/**
 * Row-major ARGB image.
 */
export interface ArgbImage {
  width: number;
  height: number;
  pixels: Uint32Array;
}

/**
 * Per-tile parameters of a predictor or color transform.
 */
export interface TileTransform {
  /** log2 of the tile size */
  bits: number;

  /** One entry per tile, row-major, subSampleSize(width) per row */
  data: Uint32Array;
}

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'predicting' | 'unpredicting' | 'decorrelating' | 'correlating';
  current: number;
  total: number;
}

export interface TransformOptions {
  /** Called after each row */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Number of tiles needed to cover `size` pixels.
 */
export function subSampleSize(size: number, bits: number): number {
  return (size + (1 << bits) - 1) >> bits;
}

/**
 * Build a predictor tile map from a list of modes.
 */
export function createPredictorTransform(
  bits: number,
  modes: readonly PredictorMode[]
): TileTransform {
  return { bits, data: Uint32Array.from(modes, (mode) => (ARGB_BLACK | (mode << 8)) >>> 0) };
}

/**
 * Replace every pixel by its residual against the prediction from the
 * original neighbors.
 */
export function applyPredictorTransform(
  image: ArgbImage,
  transform: TileTransform,
  options: TransformOptions = {}
): ArgbImage {
  validateImage(image);
  validateTransform(image, transform);

  const { width, height, pixels } = image;
  const residuals = new Uint32Array(pixels.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      residuals[i] = subPixels(pixels[i], predictAt(pixels, width, transform, x, y));
    }
    options.onProgress?.({ stage: 'predicting', current: y + 1, total: height });
  }

  return { width, height, pixels: residuals };
}

/**
 * Rebuild the image from residuals. Rows are reconstructed top to bottom so
 * every prediction reads already-rebuilt pixels.
 */
export function inversePredictorTransform(
  residuals: ArgbImage,
  transform: TileTransform,
  options: TransformOptions = {}
): ArgbImage {
  validateImage(residuals);
  validateTransform(residuals, transform);

  const { width, height, pixels: input } = residuals;
  const out = new Uint32Array(input.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      out[i] = addPixels(input[i], predictAt(out, width, transform, x, y));
    }
    options.onProgress?.({ stage: 'unpredicting', current: y + 1, total: height });
  }

  return { width, height, pixels: out };
}

/**
 * Forward cross-color transform with per-tile multipliers.
 */
export function applyColorTransform(
  image: ArgbImage,
  transform: TileTransform,
  options: TransformOptions = {}
): ArgbImage {
  return mapTiles(image, transform, 'decorrelating', transformColorPixel, options);
}

/**
 * Inverse cross-color transform with per-tile multipliers.
 */
export function inverseColorTransform(
  image: ArgbImage,
  transform: TileTransform,
  options: TransformOptions = {}
): ArgbImage {
  return mapTiles(image, transform, 'correlating', transformColorInversePixel, options);
}

export function applySubtractGreen(image: ArgbImage): ArgbImage {
  validateImage(image);
  return { ...image, pixels: subtractGreen(image.pixels.slice()) };
}

export function inverseSubtractGreen(image: ArgbImage): ArgbImage {
  validateImage(image);
  return { ...image, pixels: addGreen(image.pixels.slice()) };
}

/**
 * Prediction for (x, y) from `pixels`, which holds original pixels when
 * encoding and rebuilt ones when decoding.
 *
 * Edges: (0, 0) predicts black, the rest of row 0 the left pixel, column 0
 * the top pixel. The last column's top-right neighbor is the first pixel of
 * the current row.
 */
function predictAt(
  pixels: Uint32Array,
  width: number,
  transform: TileTransform,
  x: number,
  y: number
): Pixel {
  const i = y * width + x;
  if (y === 0) {
    return x === 0 ? ARGB_BLACK : pixels[i - 1];
  }
  if (x === 0) {
    return pixels[i - width];
  }

  const tilesPerRow = subSampleSize(width, transform.bits);
  const entry = transform.data[(y >> transform.bits) * tilesPerRow + (x >> transform.bits)];
  const mode = (entry >>> 8) & 0xf;
  // 14 and 15 fit the 4-bit field but name no predictor
  if (mode >= 14) {
    return ARGB_BLACK;
  }

  return predictNeighbors(toPredictorMode(mode), {
    left: pixels[i - 1],
    top: pixels[i - width],
    topLeft: pixels[i - width - 1],
    // for the last column this is the first pixel of the current row
    topRight: pixels[i - width + 1],
  });
}

function mapTiles(
  image: ArgbImage,
  transform: TileTransform,
  stage: ProgressInfo['stage'],
  map: typeof transformColorPixel,
  options: TransformOptions
): ArgbImage {
  validateImage(image);
  validateTransform(image, transform);

  const { width, height, pixels } = image;
  const out = new Uint32Array(pixels.length);
  const tilesPerRow = subSampleSize(width, transform.bits);

  for (let y = 0; y < height; y++) {
    const tileRow = (y >> transform.bits) * tilesPerRow;
    for (let x = 0; x < width; x++) {
      const m = colorCodeToMultipliers(transform.data[tileRow + (x >> transform.bits)]);
      out[y * width + x] = map(m, pixels[y * width + x]);
    }
    options.onProgress?.({ stage, current: y + 1, total: height });
  }

  return { width, height, pixels: out };
}

function validateImage(image: ArgbImage): void {
  const { width, height, pixels } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidArgumentError(`Invalid image size: ${width}x${height}`);
  }
  if (pixels.length !== width * height) {
    throw new InvalidArgumentError(
      `Image ${width}x${height} needs ${width * height} pixels, got ${pixels.length}`
    );
  }
}

function validateTransform(image: ArgbImage, transform: TileTransform): void {
  const { bits, data } = transform;
  if (!Number.isInteger(bits) || bits < MIN_TRANSFORM_BITS || bits > MAX_TRANSFORM_BITS) {
    throw new InvalidArgumentError(
      `Transform bits must be in [${MIN_TRANSFORM_BITS}, ${MAX_TRANSFORM_BITS}], got ${bits}`
    );
  }
  const tiles = subSampleSize(image.width, bits) * subSampleSize(image.height, bits);
  if (data.length < tiles) {
    throw new InvalidArgumentError(
      `Transform covers ${data.length} tiles, image needs ${tiles}`
    );
  }
}
