/**
 * Quantile Grouping
 *
 * Each period is sorted independently by factor value and cut into k
 * contiguous buckets. The factor and the return come from the same period.
 */

import { annualizeReturn, mean, TRADING_DAYS_PER_YEAR } from "@factorlab/metrics";
import { type Diagnostics, recoverPeriod } from "../diagnostics.js";
import { InsufficientDataError } from "../errors.js";
import { isPresent } from "../panel/panel.js";
import type { AlignedPair, Cell } from "../panel/types.js";
import type { GroupReturns } from "./types.js";

/**
 * Bucket sizes for n values in k buckets: n // k each, the last bucket
 * taking the remainder.
 */
export function bucketSizes(n: number, k: number): number[] {
  const base = Math.floor(n / k);
  return Array.from({ length: k }, (_, i) => (i === k - 1 ? n - (k - 1) * base : base));
}

/**
 * Split a factor row into k buckets of column indices, highest values
 * first. Ties keep column order.
 *
 * @throws InsufficientDataError with fewer than k present values
 */
export function assignBuckets(row: readonly Cell[], groupCount: number, period?: string): number[][] {
  if (!Number.isInteger(groupCount) || groupCount < 2) {
    throw new Error(`Group count must be an integer of at least 2, got ${groupCount}`);
  }

  const valid: { index: number; value: number }[] = [];
  row.forEach((value, index) => {
    if (isPresent(value)) {
      valid.push({ index, value });
    }
  });

  if (valid.length < groupCount) {
    throw new InsufficientDataError("grouping", groupCount, valid.length, period);
  }

  // Array.prototype.sort is stable
  valid.sort((a, b) => b.value - a.value);

  const buckets: number[][] = [];
  let start = 0;
  for (const size of bucketSizes(valid.length, groupCount)) {
    buckets.push(valid.slice(start, start + size).map((entry) => entry.index));
    start += size;
  }
  return buckets;
}

export interface GroupReturnOptions {
  periodsPerYear?: number;
  diagnostics?: Diagnostics;
}

/**
 * Per-bucket returns over an aligned pair.
 *
 * Members with a missing return count as zero. A skipped period adds zero
 * to every bucket's compounded return but still counts toward the
 * annualization horizon.
 */
export function computeGroupReturns(
  pair: AlignedPair,
  groupCount: number,
  options: GroupReturnOptions = {}
): GroupReturns {
  const { factor, returns } = pair;
  const periodsPerYear = options.periodsPerYear ?? TRADING_DAYS_PER_YEAR;

  const periodReturns: (number | null)[][] = [];
  const membership: (string[][] | null)[] = [];

  factor.periods.forEach((period, t) => {
    const buckets = recoverPeriod<number[][] | null>(
      "grouping",
      () => assignBuckets(factor.values[t] ?? [], groupCount, period),
      null,
      options.diagnostics
    );

    if (buckets === null) {
      periodReturns.push(new Array<number | null>(groupCount).fill(null));
      membership.push(null);
      return;
    }

    const row = returns.values[t] ?? [];
    periodReturns.push(
      buckets.map((members) =>
        mean(
          members.map((j) => {
            const ret = row[j];
            return isPresent(ret) ? ret : 0;
          })
        )
      )
    );
    membership.push(buckets.map((members) => members.map((j) => factor.instruments[j] ?? "")));
  });

  const cumulative = Array.from({ length: groupCount }, (_, g) => {
    let growth = 1;
    for (const row of periodReturns) {
      growth *= 1 + (row[g] ?? 0);
    }
    return growth - 1;
  });

  return {
    groupCount,
    annualized: cumulative.map((c) => annualizeReturn(c, factor.periods.length, periodsPerYear)),
    cumulative,
    periodReturns,
    membership,
    periods: [...factor.periods],
  };
}
