/**
 * Evaluation Orchestrator
 *
 * One call runs: validate config → smooth → invert → align → IC →
 * quantile grouping → long/short → long-only → assemble. Fatal errors
 * propagate; per-period failures are absorbed and counted.
 */

import { randomUUID } from "node:crypto";
import { type EvaluationConfig, parseEvaluationConfig } from "@factorlab/config";
import { type Logger, withRunContext } from "@factorlab/logger";
import { Diagnostics } from "./diagnostics.js";
import { deepFreeze } from "./freeze.js";
import { analyzeICDecay, evaluateIC } from "./ic/analysis.js";
import { computeICSeries, cumulativeIC, summarizeICSeries } from "./ic/metrics.js";
import { log } from "./logger.js";
import { alignPanels } from "./panel/align.js";
import { assertPanel, negatePanel } from "./panel/panel.js";
import type { Panel } from "./panel/types.js";
import { buildLongOnlyPortfolio, buildLongShortPortfolio } from "./portfolio/construction.js";
import type { PortfolioOptions } from "./portfolio/types.js";
import { computeGroupReturns } from "./quantile/grouping.js";
import { applySmoothing } from "./smoothing/pipeline.js";
import type { FactorEvaluationResult } from "./types.js";

export interface EvaluateFactorOptions {
  logger?: Logger;
  /** Defaults to a random UUID */
  runId?: string;
  factorName?: string;
  /** Variant label bound to the run's log lines */
  variant?: string;
  /** Forward horizons for rank IC decay; decay is skipped when omitted */
  decayHorizons?: readonly number[];
  /** Clock for `evaluatedAt` */
  now?: () => Date;
}

/**
 * Apply the configured smoothing and sign to a raw factor panel.
 */
export function prepareFactor(factor: Panel, config: EvaluationConfig, logger: Logger = log): Panel {
  let prepared = factor;
  if (config.smoothing.enabled) {
    prepared = applySmoothing(prepared, config.smoothing.methods, {
      defaultWindow: config.rolling_window,
      logger,
    });
  }
  if (config.invert_factor) {
    prepared = negatePanel(prepared);
  }
  return prepared;
}

/**
 * Evaluate a factor panel against a return panel.
 *
 * `config` may be partial; missing keys take their defaults.
 *
 * @throws ConfigurationError if the config is invalid
 * @throws PanelShapeError if either panel is malformed
 * @throws AlignmentError if the panels share no periods or instruments
 */
export function evaluateFactor(
  factor: Panel,
  returns: Panel,
  config: unknown = {},
  options: EvaluateFactorOptions = {}
): FactorEvaluationResult {
  const validated = parseEvaluationConfig(config);
  const runId = options.runId ?? randomUUID();
  const logger = withRunContext(options.logger ?? log, {
    runId,
    factorName: options.factorName,
    variant: options.variant,
  });

  assertPanel(factor, "factor");
  assertPanel(returns, "returns");

  logger.info(
    {
      factorShape: [factor.periods.length, factor.instruments.length],
      returnShape: [returns.periods.length, returns.instruments.length],
    },
    "Starting factor evaluation"
  );

  const pair = alignPanels(prepareFactor(factor, validated, logger), returns, logger);
  const diagnostics = new Diagnostics();

  const rankICSeries = computeICSeries(pair, "spearman", diagnostics);
  const icSeries = computeICSeries(pair, "pearson", diagnostics);
  const rankIC = summarizeICSeries(rankICSeries);
  const ic = summarizeICSeries(icSeries);
  const decay = options.decayHorizons
    ? analyzeICDecay(pair, options.decayHorizons, diagnostics)
    : undefined;
  logger.debug({ rankIC, ic, decay }, "Computed IC statistics");

  const grouping = computeGroupReturns(pair, validated.group_count, {
    periodsPerYear: validated.periods_per_year,
    diagnostics,
  });
  logger.debug({ groupReturns: grouping.annualized }, "Computed quantile group returns");

  const portfolioOptions: PortfolioOptions = {
    longPercentile: validated.long_percentile,
    shortPercentile: validated.short_percentile,
    minBreadth: validated.min_portfolio_breadth,
    periodsPerYear: validated.periods_per_year,
    riskFreeRate: validated.benchmark_return,
    diagnostics,
  };
  const longShort = buildLongShortPortfolio(pair, portfolioOptions);
  const longOnly = buildLongOnlyPortfolio(pair, portfolioOptions);

  const periods = pair.factor.periods;
  const result: FactorEvaluationResult = {
    runId,
    factorName: options.factorName,
    evaluatedAt: (options.now?.() ?? new Date()).toISOString(),
    dataPeriod: {
      startPeriod: periods[0] ?? "",
      endPeriod: periods[periods.length - 1] ?? "",
      periodCount: periods.length,
      instrumentCount: pair.factor.instruments.length,
    },
    config: validated,
    rankIC,
    rankICSeries,
    cumulativeRankIC: cumulativeIC(rankICSeries),
    ic,
    icSeries,
    decay,
    verdict: evaluateIC(rankIC, decay),
    groupReturns: grouping.annualized,
    grouping,
    longShort,
    longOnly,
    diagnostics: diagnostics.snapshot(),
  };

  if (diagnostics.total > 0) {
    logger.warn({ diagnostics: result.diagnostics }, "Some periods could not be evaluated");
  }
  logger.info(
    {
      icir: rankIC.icir,
      rankICMean: rankIC.mean,
      longShortReturn: longShort.annualizedReturn,
      excessReturn: longOnly.annualizedExcessReturn,
    },
    "Factor evaluation complete"
  );

  return deepFreeze(result);
}
