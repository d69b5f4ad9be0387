/**
 * Statistical helper functions
 */

/**
 * Calculate mean of an array
 */
export function mean(values: readonly number[]): number {
	if (values.length === 0) {
		return 0;
	}
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator), without rounding small
 * values to zero. Zero for fewer than two values.
 */
export function sampleStdDev(values: readonly number[], meanValue?: number): number {
	if (values.length < 2) {
		return 0;
	}

	const avg = meanValue ?? mean(values);
	const squaredDiffs = values.map((v) => (v - avg) ** 2);
	const variance = squaredDiffs.reduce((sum, v) => sum + v, 0) / (values.length - 1);
	return Math.sqrt(variance);
}

/**
 * Calculate sample standard deviation (n - 1 denominator)
 */
export function stdDev(values: readonly number[], meanValue?: number): number {
	const result = sampleStdDev(values, meanValue);

	// Handle floating point precision - treat very small values as 0
	return result < 1e-10 ? 0 : result;
}

/**
 * Linear-interpolated percentile (0-100) of a sample.
 *
 * Position `p/100 * (n - 1)` in the sorted sample, interpolating between the
 * two closest ranks.
 */
export function percentile(values: readonly number[], p: number): number {
	if (values.length === 0) {
		throw new Error("Cannot take a percentile of an empty sample");
	}
	const sorted = [...values].sort((a, b) => a - b);
	const position = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
	const lower = Math.floor(position);
	const upper = Math.ceil(position);
	const lowerValue = sorted[lower] ?? 0;
	const upperValue = sorted[upper] ?? lowerValue;
	return lowerValue + (upperValue - lowerValue) * (position - lower);
}
