/**
 * @factorlab/evaluation - Factor Evaluation Engine
 *
 * Aligns a factor panel with a return panel and measures how well the
 * factor predicts returns: lagged rank IC, quantile bucket returns and
 * long/short and long-only portfolio simulations.
 *
 * @example
 * ```ts
 * import { evaluateFactor, readPanelFile } from "@factorlab/evaluation";
 *
 * const factor = await readPanelFile("data/factor.csv");
 * const returns = await readPanelFile("data/returns.csv.gz");
 * const result = evaluateFactor(factor, returns, { group_count: 5 });
 * console.log(result.rankIC.icir, result.groupReturns);
 * ```
 */

export const PACKAGE_NAME = "@factorlab/evaluation";
export const VERSION = "0.1.0";

export {
  type BatchEvaluation,
  type ComparisonRow,
  comparisonTable,
  evaluateVariants,
  RANKING_METRICS,
  type RankingMetric,
  selectBestVariant,
  type VariantFailure,
  type VariantOutcome,
  type VariantSuccess,
} from "./batch.js";
export { Diagnostics, type DiagnosticsSnapshot, recoverPeriod, type StageCounts } from "./diagnostics.js";
export {
  AlignmentError,
  ComputationError,
  type EvaluationStage,
  FactorEvaluationError,
  type FactorEvaluationErrorCode,
  InsufficientDataError,
  isRecoverable,
  PanelShapeError,
} from "./errors.js";
export { type EvaluateFactorOptions, evaluateFactor, prepareFactor } from "./evaluator.js";
export { deepFreeze } from "./freeze.js";
export * from "./ic/index.js";
export * from "./io/index.js";
export * from "./panel/index.js";
export * from "./portfolio/index.js";
export * from "./quantile/index.js";
export * from "./smoothing/index.js";
export {
  type ConfiguredRun,
  loadPanels,
  type RunOptions,
  runConfiguredEvaluation,
} from "./runner.js";
export { formatSummaryLines, type ResultSummary, summarizeResult } from "./summary.js";
export type { DataPeriod, FactorEvaluationResult } from "./types.js";
