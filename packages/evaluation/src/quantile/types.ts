/**
 * Quantile grouping results.
 *
 * Bucket 1 holds the highest factor values, bucket k the lowest.
 */
export interface GroupReturns {
  /** Bucket count */
  groupCount: number;
  /** Annualized compounded return per bucket */
  annualized: number[];
  /** Compounded return per bucket over every aligned period */
  cumulative: number[];
  /** [period][bucket] mean member return; a row of nulls when the period had too few valid factors */
  periodReturns: (number | null)[][];
  /** [period][bucket] member instruments; null when the period was skipped */
  membership: (string[][] | null)[];
  periods: string[];
}
