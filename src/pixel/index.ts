export {
  type Pixel,
  ARGB_BLACK,
  argb,
  alphaOf,
  redOf,
  greenOf,
  blueOf,
  average2,
  average3,
  average4,
  addPixels,
  subPixels,
  clip255,
} from './argb.js';
export {
  PredictorMode,
  type Neighbors,
  NUM_PREDICTOR_MODES,
  toPredictorMode,
  select,
  clampedAddSubtractFull,
  clampedAddSubtractHalf,
  predict,
  predictNeighbors,
} from './predictors.js';
export {
  type ColorTransformMultipliers,
  createMultipliers,
  colorTransformDelta,
  multipliersToColorCode,
  colorCodeToMultipliers,
  transformColorPixel,
  transformColorInversePixel,
  transformColor,
  transformColorInverse,
  subtractGreen,
  addGreen,
} from './color-transform.js';
