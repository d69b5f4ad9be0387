/**
 * Per-period weight rules.
 *
 * Thresholds are percentiles of the period's valid factor values, with
 * linear interpolation between closest ranks.
 */

import { percentile } from "@factorlab/metrics";
import { ComputationError, type EvaluationStage, InsufficientDataError } from "../errors.js";
import { isPresent } from "../panel/panel.js";
import type { Cell } from "../panel/types.js";

function validValues(row: readonly Cell[], minBreadth: number, stage: EvaluationStage, period?: string): number[] {
  const valid = row.filter(isPresent);
  if (valid.length < minBreadth) {
    throw new InsufficientDataError(stage, minBreadth, valid.length, period);
  }
  return valid;
}

/**
 * Long the top of the cross-section at +0.5 in total, short the bottom at
 * -0.5 in total.
 *
 * @throws InsufficientDataError with fewer than `minBreadth` valid values
 * @throws ComputationError if an instrument qualifies for both legs
 */
export function longShortWeights(
  row: readonly Cell[],
  longPercentile: number,
  shortPercentile: number,
  minBreadth: number,
  period?: string
): number[] {
  const valid = validValues(row, minBreadth, "long_short", period);
  const high = percentile(valid, longPercentile);
  const low = percentile(valid, shortPercentile);

  const isLong = (value: Cell): value is number => isPresent(value) && value >= high;
  const isShort = (value: Cell): value is number => isPresent(value) && value <= low;

  if (row.some((value) => isLong(value) && isShort(value))) {
    throw new ComputationError("Long and short legs overlap", "long_short", period);
  }

  const nLong = row.filter(isLong).length;
  const nShort = row.filter(isShort).length;

  return row.map((value) => {
    if (isLong(value)) {
      return 0.5 / nLong;
    }
    if (isShort(value)) {
      return -0.5 / nShort;
    }
    return 0;
  });
}

/**
 * Equal weights summing to 1 over the top of the cross-section.
 *
 * @throws InsufficientDataError with fewer than `minBreadth` valid values
 */
export function longOnlyWeights(
  row: readonly Cell[],
  longPercentile: number,
  minBreadth: number,
  period?: string
): number[] {
  const valid = validValues(row, minBreadth, "long_only", period);
  const high = percentile(valid, longPercentile);

  const isLong = (value: Cell): boolean => isPresent(value) && value >= high;
  const nLong = row.filter(isLong).length;

  return row.map((value) => (isLong(value) ? 1 / nLong : 0));
}
