/**
 * Flat result summaries for tables and log output.
 */

import type { FactorEvaluationResult } from "./types.js";

export interface ResultSummary {
  [column: string]: string | number | null;
  runId: string;
  factorName: string | null;
  startPeriod: string;
  endPeriod: string;
  periodCount: number;
  instrumentCount: number;
  rankICMean: number | null;
  rankICStd: number | null;
  icir: number | null;
  rankICWinRate: number | null;
  icMean: number | null;
  longShortReturn: number;
  longShortTurnover: number;
  longShortSharpe: number | null;
  longShortMaxDrawdown: number;
  longOnlyReturn: number;
  excessReturn: number;
  longTurnover: number;
  excessSharpe: number | null;
  excessMaxDrawdown: number;
  skippedPeriods: number;
  recommendation: string;
}

/**
 * One flat record per result. Bucket returns follow as `group_1` (highest
 * factor) … `group_k`.
 */
export function summarizeResult(result: FactorEvaluationResult): ResultSummary {
  const summary: ResultSummary = {
    runId: result.runId,
    factorName: result.factorName ?? null,
    startPeriod: result.dataPeriod.startPeriod,
    endPeriod: result.dataPeriod.endPeriod,
    periodCount: result.dataPeriod.periodCount,
    instrumentCount: result.dataPeriod.instrumentCount,
    rankICMean: result.rankIC.mean,
    rankICStd: result.rankIC.std,
    icir: result.rankIC.icir,
    rankICWinRate: result.rankIC.winRate,
    icMean: result.ic.mean,
    longShortReturn: result.longShort.annualizedReturn,
    longShortTurnover: result.longShort.turnover,
    longShortSharpe: result.longShort.performance.sharpe,
    longShortMaxDrawdown: result.longShort.performance.maxDrawdown,
    longOnlyReturn: result.longOnly.annualizedReturn,
    excessReturn: result.longOnly.annualizedExcessReturn,
    longTurnover: result.longOnly.turnover,
    excessSharpe: result.longOnly.performance.sharpe,
    excessMaxDrawdown: result.longOnly.performance.maxDrawdown,
    skippedPeriods: result.diagnostics.total,
    recommendation: result.verdict.recommendation,
  };

  result.groupReturns.forEach((value, g) => {
    summary[`group_${g + 1}`] = value;
  });

  return summary;
}

function percent(value: number | null): string {
  return value === null ? "n/a" : `${(value * 100).toFixed(2)}%`;
}

function decimal(value: number | null, digits = 4): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

/**
 * Human-readable report lines.
 */
export function formatSummaryLines(result: FactorEvaluationResult): string[] {
  const { dataPeriod, rankIC, longShort, longOnly } = result;
  const groups = result.groupReturns.map((value, g) => `G${g + 1} ${percent(value)}`).join(", ");

  return [
    `Periods: ${dataPeriod.startPeriod} to ${dataPeriod.endPeriod} (${dataPeriod.periodCount}), instruments: ${dataPeriod.instrumentCount}`,
    `Rank IC mean: ${decimal(rankIC.mean)}, std: ${decimal(rankIC.std)}, ICIR: ${decimal(rankIC.icir, 3)}, win rate: ${percent(rankIC.winRate)}`,
    `Long/short annualized: ${percent(longShort.annualizedReturn)}, turnover: ${decimal(longShort.turnover)}`,
    `Long-only excess annualized: ${percent(longOnly.annualizedExcessReturn)}, turnover: ${decimal(longOnly.turnover)}`,
    `Group returns: ${groups}`,
    `Verdict: ${result.verdict.interpretation} (${result.verdict.recommendation})`,
  ];
}
