/**
 * Type definitions for return and performance metrics
 */

/**
 * Configuration for performance metrics calculation
 */
export interface MetricsConfig {
	/** Risk-free (benchmark) rate, annual, decimal */
	riskFreeRate: number;
	/** Periods per year for annualization (252 trading days) */
	periodsPerYear: number;
}

export const TRADING_DAYS_PER_YEAR = 252;

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
	riskFreeRate: 0,
	periodsPerYear: TRADING_DAYS_PER_YEAR,
};

/**
 * Summary statistics of one per-period return series
 */
export interface PerformanceStats {
	/** Compounded return over the whole span (decimal) */
	totalReturn: number;
	/** Total return restated as a yearly rate */
	annualizedReturn: number;
	/** Sample std of period returns scaled by sqrt(periods per year) */
	annualizedVolatility: number;
	/** Annualized Sharpe ratio, null on zero volatility or fewer than 2 periods */
	sharpe: number | null;
	/** Largest peak-to-trough loss of the NAV, positive decimal */
	maxDrawdown: number;
	/** Share of periods with a positive return, null for an empty series */
	winRate: number | null;
	periods: number;
}
