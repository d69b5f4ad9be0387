/**
 * IC Analysis and Aggregation
 *
 * Decay analysis across forward horizons and the human-readable verdict.
 */

import { mean } from "@factorlab/metrics";
import { type Diagnostics, recoverPeriod } from "../diagnostics.js";
import { isPresent } from "../panel/panel.js";
import type { AlignedPair, Cell } from "../panel/types.js";
import { crossSectionalIC } from "./metrics.js";
import {
  IC_DEFAULTS,
  type ICDecayResult,
  type ICInterpretation,
  type ICSummary,
  type ICVerdict,
} from "./types.js";

/**
 * Compounded return of each instrument over periods `from..to` inclusive.
 * An instrument missing a return anywhere in the window is missing.
 */
function forwardReturns(returns: readonly (readonly Cell[])[], from: number, to: number): Cell[] {
  const width = returns[from]?.length ?? 0;
  const compounded: Cell[] = new Array<Cell>(width).fill(1);

  for (let t = from; t <= to; t++) {
    const row = returns[t];
    for (let j = 0; j < width; j++) {
      const growth = compounded[j];
      const ret = row?.[j];
      compounded[j] = isPresent(growth) && isPresent(ret) ? growth * (1 + ret) : null;
    }
  }

  return compounded.map((growth) => (isPresent(growth) ? growth - 1 : null));
}

/**
 * Analyze rank IC decay across forward horizons.
 *
 * At horizon h the factor at period t-h is ranked against the return
 * compounded over periods t-h+1 … t. Horizon 1 reproduces the lagged
 * rank IC series.
 */
export function analyzeICDecay(
  pair: AlignedPair,
  horizons: readonly number[] = IC_DEFAULTS.defaultHorizons,
  diagnostics?: Diagnostics
): ICDecayResult {
  const { factor, returns } = pair;
  const icByHorizon: Record<string, number | null> = {};

  for (const h of horizons) {
    if (!Number.isInteger(h) || h < 1) {
      throw new Error(`Decay horizons must be positive integers, got ${h}`);
    }

    const periodICs: number[] = [];
    for (let t = h; t < returns.periods.length; t++) {
      const signals = factor.values[t - h];
      if (!signals) {
        continue;
      }
      const period = returns.periods[t];
      const window = forwardReturns(returns.values, t - h + 1, t);
      const ic = recoverPeriod<number | null>(
        "decay",
        () => crossSectionalIC(signals, window, "spearman", period).value,
        null,
        diagnostics
      );
      if (ic !== null) {
        periodICs.push(ic);
      }
    }

    icByHorizon[String(h)] = periodICs.length > 0 ? mean(periodICs) : null;
  }

  let optimalHorizon: number | null = null;
  let optimalIC: number | null = null;

  for (const h of horizons) {
    const ic = icByHorizon[String(h)];
    if (isPresent(ic) && (optimalIC === null || ic > optimalIC)) {
      optimalIC = ic;
      optimalHorizon = h;
    }
  }

  let halfLife: number | null = null;

  if (optimalIC !== null && optimalIC > 0) {
    const targetIC = optimalIC / 2;
    for (let i = 0; i < horizons.length - 1; i++) {
      const h1 = horizons[i];
      const h2 = horizons[i + 1];
      if (h1 === undefined || h2 === undefined) {
        continue;
      }
      const ic1 = icByHorizon[String(h1)];
      const ic2 = icByHorizon[String(h2)];
      if (!isPresent(ic1) || !isPresent(ic2)) {
        continue;
      }

      if (ic1 >= targetIC && ic2 <= targetIC && ic1 !== ic2) {
        const ratio = (ic1 - targetIC) / (ic1 - ic2);
        halfLife = h1 + ratio * (h2 - h1);
        break;
      }
    }
  }

  return {
    icByHorizon,
    horizons: [...horizons],
    optimalHorizon,
    optimalIC,
    halfLife,
  };
}

/**
 * Grade a rank IC summary. Missing statistics grade as weak.
 */
export function interpretIC(summary: ICSummary): ICInterpretation {
  const { mean: icMean, std, icir } = summary;
  if (icMean === null || std === null || icir === null) {
    return "weak";
  }
  if (icMean > IC_DEFAULTS.strongICMean && icir > IC_DEFAULTS.minICIR) {
    return "strong";
  }
  if (icMean > IC_DEFAULTS.minICMean && icir > IC_DEFAULTS.moderateICIR) {
    return "moderate";
  }
  return "weak";
}

function formatStat(value: number | null, digits: number): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

/**
 * Evaluate IC statistics and provide human-readable interpretation.
 */
export function evaluateIC(summary: ICSummary, decay?: ICDecayResult): ICVerdict {
  const details: string[] = [];

  details.push(`Mean IC: ${formatStat(summary.mean, 4)}`);
  details.push(`IC Std: ${formatStat(summary.std, 4)}`);
  details.push(`ICIR: ${formatStat(summary.icir, 3)}`);
  details.push(
    `Win Rate: ${summary.winRate === null ? "n/a" : `${(summary.winRate * 100).toFixed(1)}%`}`
  );
  details.push(`Valid Periods: ${summary.nValid} / ${summary.nPeriods}`);

  if (decay && decay.optimalHorizon !== null) {
    details.push(`Optimal Horizon: ${decay.optimalHorizon} periods`);
    details.push(`IC at Optimal: ${formatStat(decay.optimalIC, 4)}`);
    if (decay.halfLife !== null) {
      details.push(`Half-life: ${decay.halfLife.toFixed(1)} periods`);
    }
  }

  const interpretation = interpretIC(summary);
  let summaryText: string;
  let recommendation: ICVerdict["recommendation"];

  switch (interpretation) {
    case "strong":
      summaryText = "Factor shows strong predictive power with consistent IC across time.";
      recommendation = "accept";
      break;
    case "moderate":
      summaryText = "Factor shows moderate predictive power. May require additional validation.";
      recommendation = "review";
      break;
    case "weak":
      summaryText = "Factor shows weak predictive power. Consider rejecting or improving it.";
      recommendation = "reject";
      break;
  }

  return { interpretation, summary: summaryText, recommendation, details };
}
