/**
 * @factorlab/metrics - Return and Performance Metrics
 *
 * Compounding, annualization and risk statistics shared by the factor
 * evaluation engine.
 */

export const PACKAGE_NAME = "@factorlab/metrics";
export const VERSION = "0.1.0";

export { calculateMaxDrawdown } from "./drawdown.js";
export { calculatePerformance } from "./performance.js";
export { annualizeReturn, cumulativeReturn, navFromReturns } from "./returns.js";
export { calculateSharpe } from "./sharpe.js";
export { mean, percentile, sampleStdDev, stdDev } from "./statistics.js";
export {
	DEFAULT_METRICS_CONFIG,
	type MetricsConfig,
	type PerformanceStats,
	TRADING_DAYS_PER_YEAR,
} from "./types.js";
