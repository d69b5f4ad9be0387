/**
 * Trailing-Window Transforms
 *
 * Causal statistics over the last `window` periods of one instrument's
 * series (oldest first). The window shrinks at the start of the series and
 * skips missing observations. A period whose own value is missing still
 * takes the statistic of the observations in its window.
 *
 * Formula (zscore):
 *   Z = (X - μ) / σ
 *   where μ = rolling mean, σ = rolling sample standard deviation
 */

import { mean, stdDev } from "@factorlab/metrics";
import { isPresent } from "../panel/panel.js";
import type { Cell } from "../panel/types.js";

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new Error(`Rolling window must be a positive integer, got ${window}`);
  }
}

/**
 * Present values among periods `end - window + 1 … end`.
 */
export function trailingWindow(series: readonly Cell[], end: number, window: number): number[] {
  const start = Math.max(0, end - window + 1);
  return series.slice(start, end + 1).filter(isPresent);
}

/**
 * Mean of the window; missing only where the window holds no observation.
 */
export function rollingMean(series: readonly Cell[], window: number): Cell[] {
  assertWindow(window);
  return series.map((_, t) => {
    const values = trailingWindow(series, t, window);
    return values.length === 0 ? null : mean(values);
  });
}

/**
 * Sample standard deviation; missing where the window holds fewer than
 * two observations.
 */
export function rollingStd(series: readonly Cell[], window: number): Cell[] {
  assertWindow(window);
  return series.map((_, t) => {
    const values = trailingWindow(series, t, window);
    return values.length < 2 ? null : stdDev(values);
  });
}

/**
 * Rolling z-score. Non-finite scores are 0, including the score of a
 * period whose own value is missing.
 */
export function rollingZScore(series: readonly Cell[], window: number): Cell[] {
  assertWindow(window);
  return series.map((value, t) => {
    if (!isPresent(value)) {
      return 0;
    }
    const values = trailingWindow(series, t, window);
    const std = values.length < 2 ? Number.NaN : stdDev(values);
    const zscore = (value - mean(values)) / std;
    return Number.isFinite(zscore) ? zscore : 0;
  });
}
