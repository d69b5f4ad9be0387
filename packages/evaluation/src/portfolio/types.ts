import type { PerformanceStats } from "@factorlab/metrics";
import type { Diagnostics } from "../diagnostics.js";
import type { Panel, TimeSeries } from "../panel/types.js";

export interface PortfolioOptions {
  /** Long leg: factor at or above this percentile (0-100) */
  longPercentile: number;
  /** Short leg: factor at or below this percentile (0-100) */
  shortPercentile: number;
  /** Fewer valid factor values than this gives an all-zero row */
  minBreadth: number;
  periodsPerYear: number;
  /** Annual rate the Sharpe ratios are measured against */
  riskFreeRate: number;
  diagnostics?: Diagnostics;
}

export interface LongShortPortfolio {
  /** Signed weights, long leg summing to +0.5 and short leg to -0.5 */
  weights: Panel;
  returns: TimeSeries<number>;
  nav: TimeSeries<number>;
  totalReturn: number;
  annualizedReturn: number;
  /** Mean per-period sum of absolute weight changes */
  turnover: number;
  performance: PerformanceStats;
}

export interface LongOnlyPortfolio {
  /** Non-negative weights summing to 1 */
  weights: Panel;
  returns: TimeSeries<number>;
  /** Equal-weighted mean of each period's valid returns */
  benchmarkReturns: TimeSeries<number>;
  excessReturns: TimeSeries<number>;
  nav: TimeSeries<number>;
  benchmarkNav: TimeSeries<number>;
  excessNav: TimeSeries<number>;
  annualizedReturn: number;
  totalExcessReturn: number;
  annualizedExcessReturn: number;
  turnover: number;
  /** Statistics of the excess return series */
  performance: PerformanceStats;
}
