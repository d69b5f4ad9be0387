import { mean } from "@factorlab/metrics";
import { isPresent } from "../panel/panel.js";
import type { Cell } from "../panel/types.js";

/** Σ weight × return, a missing return counting as zero */
export function weightedReturn(weights: readonly number[], returns: readonly Cell[]): number {
  let total = 0;
  weights.forEach((weight, j) => {
    const ret = returns[j];
    if (weight !== 0 && isPresent(ret)) {
      total += weight * ret;
    }
  });
  return total;
}

/** Equal-weighted mean of the valid returns; zero when there are none */
export function benchmarkReturn(returns: readonly Cell[]): number {
  return mean(returns.filter(isPresent));
}

/**
 * Σ|w_t - w_{t-1}| per period. The first period is measured against an
 * all-zero row, so it counts the cost of building the initial position.
 */
export function turnoverSeries(weights: readonly (readonly number[])[]): number[] {
  let previous: readonly number[] = [];
  return weights.map((row) => {
    let turnover = 0;
    row.forEach((weight, j) => {
      turnover += Math.abs(weight - (previous[j] ?? 0));
    });
    previous = row;
    return turnover;
  });
}

export function averageTurnover(weights: readonly (readonly number[])[]): number {
  return mean(turnoverSeries(weights));
}
