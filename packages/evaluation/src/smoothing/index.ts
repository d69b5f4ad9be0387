export { exponentialSmoothing } from "./ema.js";
export {
  applySmoothing,
  resolveSmoothingStep,
  type SeriesTransform,
  type SmoothingOptions,
  WINDOWED_TRANSFORMS,
} from "./pipeline.js";
export { rollingMean, rollingStd, rollingZScore, trailingWindow } from "./rolling.js";
