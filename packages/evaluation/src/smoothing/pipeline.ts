/**
 * Smoothing Pipeline
 *
 * Applies configured smoothing steps, in order, to every instrument of a
 * factor panel.
 */

import type { SmoothingMethodName, SmoothingStep } from "@factorlab/config";
import type { Logger } from "@factorlab/logger";
import { log } from "../logger.js";
import { mapColumns } from "../panel/panel.js";
import type { Cell, Panel } from "../panel/types.js";
import { exponentialSmoothing } from "./ema.js";
import { rollingMean, rollingStd, rollingZScore } from "./rolling.js";

export type SeriesTransform = (series: readonly Cell[]) => Cell[];

/**
 * Windowed transforms by method name. `ema` is parameterized by alpha
 * instead and resolved separately.
 */
export const WINDOWED_TRANSFORMS: Record<
  Exclude<SmoothingMethodName, "ema">,
  (series: readonly Cell[], window: number) => Cell[]
> = {
  rolling_mean: rollingMean,
  rolling_std: rollingStd,
  zscore: rollingZScore,
};

/**
 * Resolve a configured step into a per-instrument transform. A step
 * without its own window uses `defaultWindow`.
 */
export function resolveSmoothingStep(step: SmoothingStep, defaultWindow: number): SeriesTransform {
  if (step.method === "ema") {
    const { alpha } = step;
    return (series) => exponentialSmoothing(series, alpha);
  }
  const transform = WINDOWED_TRANSFORMS[step.method];
  const window = step.window ?? defaultWindow;
  return (series) => transform(series, window);
}

export interface SmoothingOptions {
  /** Window for steps that leave it out */
  defaultWindow: number;
  logger?: Logger;
}

/**
 * Run smoothing steps over a panel. An empty step list returns the input
 * panel itself.
 */
export function applySmoothing(
  panel: Panel,
  steps: readonly SmoothingStep[],
  options: SmoothingOptions
): Panel {
  const logger = options.logger ?? log;
  let current = panel;

  for (const step of steps) {
    const transform = resolveSmoothingStep(step, options.defaultWindow);
    current = mapColumns(current, (column) => transform(column));
    logger.debug({ step }, "Applied smoothing step");
  }

  return current;
}
