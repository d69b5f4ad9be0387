import { calculateMaxDrawdown } from "./drawdown.js";
import { annualizeReturn, cumulativeReturn, navFromReturns } from "./returns.js";
import { calculateSharpe } from "./sharpe.js";
import { stdDev } from "./statistics.js";
import { DEFAULT_METRICS_CONFIG, type MetricsConfig, type PerformanceStats } from "./types.js";

/**
 * Summarize a per-period return series.
 *
 * Drawdown is measured on the NAV with its starting value of 1 included, so
 * a loss in the first period counts.
 */
export function calculatePerformance(
	returns: readonly number[],
	config: MetricsConfig = DEFAULT_METRICS_CONFIG,
): PerformanceStats {
	const totalReturn = cumulativeReturn(returns);
	const positive = returns.filter((r) => r > 0).length;

	return {
		totalReturn,
		annualizedReturn: annualizeReturn(totalReturn, returns.length, config.periodsPerYear),
		annualizedVolatility: stdDev(returns) * Math.sqrt(config.periodsPerYear),
		sharpe: calculateSharpe(returns, config),
		maxDrawdown: calculateMaxDrawdown([1, ...navFromReturns(returns)]),
		winRate: returns.length > 0 ? positive / returns.length : null,
		periods: returns.length,
	};
}
