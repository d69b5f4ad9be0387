/**
 * IC Metric Calculations
 *
 * Lagged cross-sectional IC: the factor at period t-1 against returns at
 * period t, one value per period of an aligned pair.
 */

import { mean, sampleStdDev } from "@factorlab/metrics";
import { type Diagnostics, recoverPeriod } from "../diagnostics.js";
import { ComputationError, type EvaluationStage, InsufficientDataError } from "../errors.js";
import { isPresent } from "../panel/panel.js";
import type { AlignedPair, Cell, TimeSeries } from "../panel/types.js";
import { pearsonCorrelation, spearmanCorrelation } from "./statistics.js";
import { type CorrelationMethod, IC_DEFAULTS, type ICPoint, type ICSummary } from "./types.js";

const STAGE_BY_METHOD: Record<CorrelationMethod, EvaluationStage> = {
  spearman: "rank_ic",
  pearson: "ic",
};

/**
 * Calculate cross-sectional IC for a single time period.
 *
 * Only instruments present in both rows take part.
 *
 * @throws InsufficientDataError with fewer than two jointly valid instruments
 * @throws ComputationError when the correlation is undefined
 */
export function crossSectionalIC(
  signals: readonly Cell[],
  returns: readonly Cell[],
  method: CorrelationMethod = "spearman",
  period?: string
): { value: number; nObservations: number } {
  if (signals.length !== returns.length) {
    throw new Error(
      `Signals and returns must have same length: ${signals.length} vs ${returns.length}`
    );
  }

  const validSignals: number[] = [];
  const validReturns: number[] = [];
  for (let i = 0; i < signals.length; i++) {
    const signal = signals[i];
    const ret = returns[i];
    if (isPresent(signal) && isPresent(ret)) {
      validSignals.push(signal);
      validReturns.push(ret);
    }
  }

  const nObservations = validSignals.length;
  const stage = STAGE_BY_METHOD[method];
  if (nObservations < IC_DEFAULTS.minObservations) {
    throw new InsufficientDataError(stage, IC_DEFAULTS.minObservations, nObservations, period);
  }

  const correlate = method === "spearman" ? spearmanCorrelation : pearsonCorrelation;
  let value: number;
  try {
    value = correlate(validSignals, validReturns);
  } catch (error) {
    if (error instanceof ComputationError) {
      throw new ComputationError(error.message, stage, period);
    }
    throw error;
  }
  if (!Number.isFinite(value)) {
    throw new ComputationError("Correlation is not finite", stage, period);
  }

  return { value, nObservations };
}

/**
 * Lagged IC series over an aligned pair.
 *
 * The first period has no prior factor row and is always missing. Periods
 * whose cross-section cannot produce a correlation are missing and counted
 * in `diagnostics`.
 */
export function computeICSeries(
  pair: AlignedPair,
  method: CorrelationMethod = "spearman",
  diagnostics?: Diagnostics
): ICPoint[] {
  const { factor, returns } = pair;
  const stage = STAGE_BY_METHOD[method];

  return returns.periods.map((period, t) => {
    const previousFactor = t > 0 ? factor.values[t - 1] : undefined;
    const currentReturns = returns.values[t];
    if (!previousFactor || !currentReturns) {
      return { period, value: null, nObservations: 0 };
    }

    return recoverPeriod<ICPoint>(
      stage,
      () => ({ period, ...crossSectionalIC(previousFactor, currentReturns, method, period) }),
      { period, value: null, nObservations: 0 },
      diagnostics
    );
  });
}

/**
 * Calculate IC statistics from a series of IC values.
 */
export function summarizeICSeries(series: TimeSeries): ICSummary {
  const valid = series.map((point) => point.value).filter(isPresent);
  const n = valid.length;

  if (n === 0) {
    return { mean: null, std: null, icir: null, winRate: null, nPeriods: series.length, nValid: 0 };
  }

  const icMean = mean(valid);
  const std = n > 1 ? sampleStdDev(valid) : null;
  const icir = std !== null && std !== 0 ? icMean / std : null;
  const winRate = valid.filter((ic) => ic > 0).length / n;

  return { mean: icMean, std, icir, winRate, nPeriods: series.length, nValid: n };
}

/**
 * Running sum of the non-missing values; missing points stay missing.
 */
export function cumulativeIC(series: TimeSeries): TimeSeries {
  let running = 0;
  return series.map(({ period, value }) => {
    if (!isPresent(value)) {
      return { period, value: null };
    }
    running += value;
    return { period, value: running };
  });
}
