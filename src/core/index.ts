export { RangeEncoder, normShift } from './range-encoder.js';
export { RangeDecoder } from './range-decoder.js';
export { BitOutputStream, BitInputStream, MAX_BITS_PER_CALL } from './bit-stream.js';
export {
  ByteBuffer,
  type CoderOptions,
  DEFAULT_CODER_OPTIONS,
} from './byte-buffer.js';
export {
  CodecError,
  InvalidArgumentError,
  CapacityExceededError,
  TruncatedInputError,
  InvalidStateError,
} from './errors.js';
