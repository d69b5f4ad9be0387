/**
 * Batch Evaluation
 *
 * Evaluates one factor/returns pair under several named configuration
 * variants. A variant that fails fatally is recorded, not rethrown.
 */

import { ConfigurationError, mergeEvaluationConfig, type VariantInput } from "@factorlab/config";
import { FactorEvaluationError } from "./errors.js";
import { type EvaluateFactorOptions, evaluateFactor } from "./evaluator.js";
import { log } from "./logger.js";
import type { Panel } from "./panel/types.js";
import { summarizeResult } from "./summary.js";
import type { FactorEvaluationResult } from "./types.js";

export interface VariantSuccess {
  name: string;
  ok: true;
  result: FactorEvaluationResult;
}

export interface VariantFailure {
  name: string;
  ok: false;
  error: FactorEvaluationError | ConfigurationError;
}

export type VariantOutcome = VariantSuccess | VariantFailure;

export interface ComparisonRow {
  [column: string]: string | number | null;
  variant: string;
  error: string | null;
}

export interface BatchEvaluation {
  outcomes: VariantOutcome[];
  comparison: ComparisonRow[];
}

export type RankingMetric = "icir" | "rankICMean" | "longShortReturn" | "excessReturn" | "longShortSharpe";

export const RANKING_METRICS: Record<RankingMetric, (result: FactorEvaluationResult) => number | null> = {
  icir: (result) => result.rankIC.icir,
  rankICMean: (result) => result.rankIC.mean,
  longShortReturn: (result) => result.longShort.annualizedReturn,
  excessReturn: (result) => result.longOnly.annualizedExcessReturn,
  longShortSharpe: (result) => result.longShort.performance.sharpe,
};

function isFatalEvaluationError(error: unknown): error is FactorEvaluationError | ConfigurationError {
  return error instanceof FactorEvaluationError || error instanceof ConfigurationError;
}

export function comparisonTable(outcomes: readonly VariantOutcome[]): ComparisonRow[] {
  return outcomes.map((outcome) =>
    outcome.ok
      ? { ...summarizeResult(outcome.result), variant: outcome.name, error: null }
      : { variant: outcome.name, error: outcome.error.message }
  );
}

/**
 * Run every variant's overrides on top of `baseConfig`.
 *
 * @throws ConfigurationError if two variants share a name
 */
export function evaluateVariants(
  factor: Panel,
  returns: Panel,
  baseConfig: unknown,
  variants: readonly VariantInput[],
  options: EvaluateFactorOptions = {}
): BatchEvaluation {
  const seen = new Set<string>();
  for (const { name } of variants) {
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate variant name ${name}`, [
        { path: "variants", message: `duplicate name ${name}` },
      ]);
    }
    seen.add(name);
  }

  const outcomes = variants.map((variant): VariantOutcome => {
    try {
      const config = mergeEvaluationConfig(baseConfig, variant.overrides ?? {});
      const result = evaluateFactor(factor, returns, config, {
        ...options,
        runId: options.runId ? `${options.runId}-${variant.name}` : undefined,
        variant: variant.name,
      });
      return { name: variant.name, ok: true, result };
    } catch (error) {
      if (!isFatalEvaluationError(error)) {
        throw error;
      }
      (options.logger ?? log).warn({ variant: variant.name, code: error.code, error: error.message }, "Variant failed");
      return { name: variant.name, ok: false, error };
    }
  });

  return { outcomes, comparison: comparisonTable(outcomes) };
}

/**
 * Successful variant with the highest value of `metric`, or null when no
 * variant produced one.
 */
export function selectBestVariant(
  batch: BatchEvaluation,
  metric: RankingMetric = "icir"
): VariantSuccess | null {
  const score = RANKING_METRICS[metric];
  let best: VariantSuccess | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const outcome of batch.outcomes) {
    if (!outcome.ok) {
      continue;
    }
    const value = score(outcome.result);
    if (value !== null && value > bestScore) {
      best = outcome;
      bestScore = value;
    }
  }

  return best;
}
