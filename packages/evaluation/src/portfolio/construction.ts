/**
 * Portfolio Construction
 *
 * Turns an aligned pair into daily-rebalanced long/short and long-only
 * portfolios. Weights at period t are formed from the factor at t and
 * earn the returns at t.
 */

import {
  annualizeReturn,
  calculatePerformance,
  cumulativeReturn,
  type MetricsConfig,
  navFromReturns,
} from "@factorlab/metrics";
import { recoverPeriod } from "../diagnostics.js";
import type { AlignedPair, Panel, TimeSeries } from "../panel/types.js";
import { averageTurnover, benchmarkReturn, weightedReturn } from "./returns.js";
import type { LongOnlyPortfolio, LongShortPortfolio, PortfolioOptions } from "./types.js";
import { longOnlyWeights, longShortWeights } from "./weights.js";

function toSeries(periods: readonly string[], values: readonly number[]): TimeSeries<number> {
  return periods.map((period, t) => ({ period, value: values[t] ?? 0 }));
}

function weightPanel(pair: AlignedPair, rows: number[][]): Panel {
  return {
    periods: [...pair.factor.periods],
    instruments: [...pair.factor.instruments],
    values: rows,
  };
}

function metricsConfig(options: PortfolioOptions): MetricsConfig {
  return { riskFreeRate: options.riskFreeRate, periodsPerYear: options.periodsPerYear };
}

export function buildLongShortPortfolio(pair: AlignedPair, options: PortfolioOptions): LongShortPortfolio {
  const { factor, returns } = pair;
  const zeroRow = factor.instruments.map(() => 0);

  const rows = factor.periods.map((period, t) =>
    recoverPeriod(
      "long_short",
      () =>
        longShortWeights(
          factor.values[t] ?? [],
          options.longPercentile,
          options.shortPercentile,
          options.minBreadth,
          period
        ),
      [...zeroRow],
      options.diagnostics
    )
  );

  const periodReturns = rows.map((weights, t) => weightedReturn(weights, returns.values[t] ?? []));
  const totalReturn = cumulativeReturn(periodReturns);

  return {
    weights: weightPanel(pair, rows),
    returns: toSeries(factor.periods, periodReturns),
    nav: toSeries(factor.periods, navFromReturns(periodReturns)),
    totalReturn,
    annualizedReturn: annualizeReturn(totalReturn, periodReturns.length, options.periodsPerYear),
    turnover: averageTurnover(rows),
    performance: calculatePerformance(periodReturns, metricsConfig(options)),
  };
}

export function buildLongOnlyPortfolio(pair: AlignedPair, options: PortfolioOptions): LongOnlyPortfolio {
  const { factor, returns } = pair;
  const zeroRow = factor.instruments.map(() => 0);

  const rows = factor.periods.map((period, t) =>
    recoverPeriod(
      "long_only",
      () => longOnlyWeights(factor.values[t] ?? [], options.longPercentile, options.minBreadth, period),
      [...zeroRow],
      options.diagnostics
    )
  );

  const portfolioReturns = rows.map((weights, t) => weightedReturn(weights, returns.values[t] ?? []));
  const benchmarkReturns = factor.periods.map((_, t) => benchmarkReturn(returns.values[t] ?? []));
  const excessReturns = portfolioReturns.map((r, t) => r - (benchmarkReturns[t] ?? 0));

  const n = portfolioReturns.length;
  const totalExcessReturn = cumulativeReturn(excessReturns);

  return {
    weights: weightPanel(pair, rows),
    returns: toSeries(factor.periods, portfolioReturns),
    benchmarkReturns: toSeries(factor.periods, benchmarkReturns),
    excessReturns: toSeries(factor.periods, excessReturns),
    nav: toSeries(factor.periods, navFromReturns(portfolioReturns)),
    benchmarkNav: toSeries(factor.periods, navFromReturns(benchmarkReturns)),
    excessNav: toSeries(factor.periods, navFromReturns(excessReturns)),
    annualizedReturn: annualizeReturn(cumulativeReturn(portfolioReturns), n, options.periodsPerYear),
    totalExcessReturn,
    annualizedExcessReturn: annualizeReturn(totalExcessReturn, n, options.periodsPerYear),
    turnover: averageTurnover(rows),
    performance: calculatePerformance(excessReturns, metricsConfig(options)),
  };
}
