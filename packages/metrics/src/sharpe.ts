/**
 * Sharpe Ratio calculations
 */

import { mean, stdDev } from "./statistics.js";
import { DEFAULT_METRICS_CONFIG, type MetricsConfig } from "./types.js";

/**
 * Calculate Sharpe Ratio
 *
 * Formula: (Return - Risk-Free Rate) / Std Dev
 * Annualized: Multiply by sqrt(periods per year)
 *
 * @param returns Array of period returns (decimal)
 * @returns Annualized Sharpe ratio, or null if insufficient data
 */
export function calculateSharpe(
	returns: readonly number[],
	config: MetricsConfig = DEFAULT_METRICS_CONFIG,
): number | null {
	if (returns.length < 2) {
		return null;
	}

	const meanReturn = mean(returns);
	const std = stdDev(returns, meanReturn);

	if (std === 0) {
		return null; // Zero volatility case
	}

	// Convert annual risk-free rate to per-period
	const periodRiskFreeRate = config.riskFreeRate / config.periodsPerYear;
	const periodSharpe = (meanReturn - periodRiskFreeRate) / std;

	return periodSharpe * Math.sqrt(config.periodsPerYear);
}
