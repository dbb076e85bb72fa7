/**
 * webp-primitives
 *
 * Bit-exact serialization and pixel decorrelation primitives of the WebP
 * codec family: the boolean range coder of the lossy format, the LSB-first
 * bit packer of the lossless format, the 14 lossless spatial predictors and
 * the subtract-green / cross-color transforms.
 *
 * @example
 * ```typescript
 * import { RangeEncoder, RangeDecoder } from 'webp-primitives';
 *
 * const encoder = new RangeEncoder();
 * encoder.putBit(1, 200);
 * encoder.putBit(0, 30);
 * const data = encoder.finish();
 *
 * const decoder = new RangeDecoder(data);
 * decoder.getBit(200); // 1
 * decoder.getBit(30); // 0
 * ```
 */

// High-level helpers
export {
  encodeDecisions,
  decodeDecisions,
  packFields,
  unpackFields,
  splitWideField,
  type Decision,
  type Field,
  type CodingResult,
  type PackResult,
} from './coding.js';

// Image-level transforms
export {
  type ArgbImage,
  type TileTransform,
  type ProgressInfo,
  type TransformOptions,
  MIN_TRANSFORM_BITS,
  MAX_TRANSFORM_BITS,
  subSampleSize,
  createPredictorTransform,
  applyPredictorTransform,
  inversePredictorTransform,
  applyColorTransform,
  inverseColorTransform,
  applySubtractGreen,
  inverseSubtractGreen,
} from './image-transforms.js';

// Coders
export {
  RangeEncoder,
  RangeDecoder,
  BitOutputStream,
  BitInputStream,
  MAX_BITS_PER_CALL,
  ByteBuffer,
  type CoderOptions,
  DEFAULT_CODER_OPTIONS,
  CodecError,
  InvalidArgumentError,
  CapacityExceededError,
  TruncatedInputError,
  InvalidStateError,
} from './core/index.js';

// Pixel primitives
export * from './pixel/index.js';
