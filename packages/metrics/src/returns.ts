/**
 * Return calculation functions
 */

import { TRADING_DAYS_PER_YEAR } from "./types.js";

/**
 * Calculate cumulative return from a returns series
 *
 * @param returns Array of period returns (decimal)
 * @returns Cumulative return (decimal, e.g., 0.10 = 10%)
 */
export function cumulativeReturn(returns: readonly number[]): number {
	if (returns.length === 0) {
		return 0;
	}

	let cumulative = 1;
	for (const r of returns) {
		cumulative *= 1 + r;
	}

	return cumulative - 1;
}

/**
 * Net asset value path: running product of (1 + r), one point per period.
 */
export function navFromReturns(returns: readonly number[]): number[] {
	const nav: number[] = [];
	let value = 1;
	for (const r of returns) {
		value *= 1 + r;
		nav.push(value);
	}
	return nav;
}

/**
 * Restate a cumulative return earned over `periods` periods as a yearly rate:
 * (1 + cumulative)^(periodsPerYear / periods) - 1.
 *
 * A wiped-out NAV (cumulative <= -1) has no real root and annualizes to -1.
 */
export function annualizeReturn(
	cumulative: number,
	periods: number,
	periodsPerYear: number = TRADING_DAYS_PER_YEAR,
): number {
	if (periods <= 0) {
		return 0;
	}
	const growth = 1 + cumulative;
	if (growth <= 0) {
		return -1;
	}
	return growth ** (periodsPerYear / periods) - 1;
}
