/**
 * Factor Evaluation Result Types
 */

import type { EvaluationConfig } from "@factorlab/config";
import type { DiagnosticsSnapshot } from "./diagnostics.js";
import type { ICDecayResult, ICPoint, ICSummary, ICVerdict } from "./ic/types.js";
import type { TimeSeries } from "./panel/types.js";
import type { LongOnlyPortfolio, LongShortPortfolio } from "./portfolio/types.js";
import type { GroupReturns } from "./quantile/types.js";

export interface DataPeriod {
  startPeriod: string;
  endPeriod: string;
  periodCount: number;
  instrumentCount: number;
}

/**
 * Everything one evaluation call produces. Built once per call and frozen.
 */
export interface FactorEvaluationResult {
  readonly runId: string;
  readonly factorName?: string;
  /** ISO timestamp of the call */
  readonly evaluatedAt: string;
  readonly dataPeriod: DataPeriod;
  /** Validated configuration, defaults filled in */
  readonly config: EvaluationConfig;
  /** Lagged Spearman IC statistics */
  readonly rankIC: ICSummary;
  readonly rankICSeries: readonly ICPoint[];
  readonly cumulativeRankIC: TimeSeries;
  /** Lagged Pearson IC statistics */
  readonly ic: ICSummary;
  readonly icSeries: readonly ICPoint[];
  /** Rank IC by forward horizon, when requested */
  readonly decay?: ICDecayResult;
  readonly verdict: ICVerdict;
  /** Annualized return per bucket, highest factor first */
  readonly groupReturns: readonly number[];
  readonly grouping: GroupReturns;
  readonly longShort: LongShortPortfolio;
  readonly longOnly: LongOnlyPortfolio;
  readonly diagnostics: DiagnosticsSnapshot;
}
