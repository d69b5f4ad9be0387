/**
 * Correlation Functions for IC Calculation
 *
 * Pearson and Spearman correlation plus tie-averaged ranking. Degenerate
 * samples (fewer than two points, zero variance) raise ComputationError
 * instead of reporting a correlation of zero.
 */

import { ComputationError } from "../errors.js";

/**
 * Calculate Spearman rank correlation between two arrays.
 */
export function spearmanCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length) {
    throw new Error(`Arrays must have same length: ${x.length} vs ${y.length}`);
  }

  return pearsonCorrelation(computeRanks(x), computeRanks(y));
}

/**
 * Calculate Pearson correlation coefficient.
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length) {
    throw new Error(`Arrays must have same length: ${x.length} vs ${y.length}`);
  }

  const n = x.length;
  if (n < 2) {
    throw new ComputationError(`Correlation needs at least two observations, got ${n}`);
  }

  const meanX = x.reduce((a, b) => a + b, 0) / n;
  const meanY = y.reduce((a, b) => a + b, 0) / n;

  let sumXY = 0;
  let sumX2 = 0;
  let sumY2 = 0;

  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? 0) - meanX;
    const dy = (y[i] ?? 0) - meanY;
    sumXY += dx * dy;
    sumX2 += dx * dx;
    sumY2 += dy * dy;
  }

  const denominator = Math.sqrt(sumX2 * sumY2);
  if (denominator < 1e-15) {
    throw new ComputationError("Correlation is undefined for a constant sample");
  }

  // Rounding can push a perfect correlation just past ±1
  return Math.max(-1, Math.min(1, sumXY / denominator));
}

/**
 * Compute ranks for an array (handling ties with average rank).
 */
export function computeRanks(arr: readonly number[]): number[] {
  const n = arr.length;
  const indexed = arr.map((v, i) => ({ value: v, index: i }));
  indexed.sort((a, b) => a.value - b.value);

  const ranks = new Array<number>(n);
  let i = 0;

  while (i < n) {
    let j = i;
    // Find all tied values
    while (j < n - 1 && indexed[j]?.value === indexed[j + 1]?.value) {
      j++;
    }

    // Average rank for tied values
    const avgRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) {
      const idx = indexed[k]?.index;
      if (idx !== undefined) {
        ranks[idx] = avgRank;
      }
    }

    i = j + 1;
  }

  return ranks;
}
