/**
 * Tests for return and performance metrics
 */

import { describe, expect, test } from "vitest";
import {
	annualizeReturn,
	calculateMaxDrawdown,
	calculatePerformance,
	calculateSharpe,
	cumulativeReturn,
	mean,
	navFromReturns,
	percentile,
	sampleStdDev,
	stdDev,
} from "../src/index.js";

describe("statistics", () => {
	test("mean and sample std", () => {
		expect(mean([1, 2, 3, 4])).toBe(2.5);
		expect(stdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12);
	});

	test("std of fewer than two values is zero", () => {
		expect(stdDev([3])).toBe(0);
		expect(stdDev([])).toBe(0);
	});

	test("sampleStdDev keeps a tiny spread that stdDev rounds to zero", () => {
		const values = [0.5, 0.5 + 1e-11];
		expect(stdDev(values)).toBe(0);
		expect(sampleStdDev(values)).toBeGreaterThan(7e-12);
		expect(sampleStdDev(values)).toBeLessThan(7.1e-12);
		expect(sampleStdDev([2, 2, 2])).toBe(0);
	});

	test("mean of empty array is zero", () => {
		expect(mean([])).toBe(0);
	});
});

describe("percentile", () => {
	const sample = [10, 1, 9, 2, 8, 3, 7, 4, 6, 5];

	test("interpolates between closest ranks", () => {
		expect(percentile(sample, 90)).toBeCloseTo(9.1, 12);
		expect(percentile(sample, 10)).toBeCloseTo(1.9, 12);
		expect(percentile(sample, 50)).toBeCloseTo(5.5, 12);
	});

	test("endpoints are the extremes", () => {
		expect(percentile(sample, 0)).toBe(1);
		expect(percentile(sample, 100)).toBe(10);
	});

	test("throws on an empty sample", () => {
		expect(() => percentile([], 50)).toThrow("empty sample");
	});
});

describe("returns", () => {
	test("cumulative return compounds", () => {
		expect(cumulativeReturn([0.1, -0.1])).toBeCloseTo(-0.01, 12);
		expect(cumulativeReturn([])).toBe(0);
	});

	test("nav is the running product", () => {
		const nav = navFromReturns([0.1, -0.1]);
		expect(nav).toHaveLength(2);
		expect(nav[0]).toBeCloseTo(1.1, 12);
		expect(nav[1]).toBeCloseTo(0.99, 12);
	});

	test("annualizing over exactly one year keeps the rate", () => {
		expect(annualizeReturn(0.1, 252)).toBeCloseTo(0.1, 10);
	});

	test("annualizing over two years takes the square root", () => {
		expect(annualizeReturn(0.21, 504)).toBeCloseTo(0.1, 10);
	});

	test("custom periods per year", () => {
		expect(annualizeReturn(0.1, 12, 12)).toBeCloseTo(0.1, 10);
	});

	test("wiped-out nav annualizes to -1", () => {
		expect(annualizeReturn(-1, 10)).toBe(-1);
		expect(annualizeReturn(-1.5, 10)).toBe(-1);
	});

	test("zero periods annualize to zero", () => {
		expect(annualizeReturn(0.5, 0)).toBe(0);
	});
});

describe("calculateMaxDrawdown", () => {
	test("measures the deepest peak-to-trough loss", () => {
		expect(calculateMaxDrawdown([100, 120, 90, 130])).toBeCloseTo(0.25, 12);
	});

	test("monotonic equity has no drawdown", () => {
		expect(calculateMaxDrawdown([1, 2, 3])).toBe(0);
	});
});

describe("calculateSharpe", () => {
	test("annualizes the per-period ratio", () => {
		const expected = (0.01 / Math.sqrt(0.0002)) * Math.sqrt(252);
		expect(calculateSharpe([0.02, 0])).toBeCloseTo(expected, 8);
	});

	test("subtracts the per-period risk-free rate", () => {
		const config = { riskFreeRate: 0.252, periodsPerYear: 252 };
		const expected = ((0.01 - 0.001) / Math.sqrt(0.0002)) * Math.sqrt(252);
		expect(calculateSharpe([0.02, 0], config)).toBeCloseTo(expected, 8);
	});

	test("returns null without volatility or data", () => {
		expect(calculateSharpe([0.01, 0.01, 0.01])).toBeNull();
		expect(calculateSharpe([0.01])).toBeNull();
	});
});

describe("calculatePerformance", () => {
	test("summarizes a short series", () => {
		const stats = calculatePerformance([0.1, -0.1]);
		expect(stats.totalReturn).toBeCloseTo(-0.01, 12);
		expect(stats.annualizedReturn).toBeCloseTo(0.99 ** 126 - 1, 10);
		expect(stats.maxDrawdown).toBeCloseTo(0.1, 12);
		expect(stats.winRate).toBe(0.5);
		expect(stats.periods).toBe(2);
		expect(stats.annualizedVolatility).toBeCloseTo(Math.sqrt(0.02) * Math.sqrt(252), 10);
	});

	test("counts a first-period loss as drawdown", () => {
		const stats = calculatePerformance([-0.2, 0.1]);
		expect(stats.maxDrawdown).toBeCloseTo(0.2, 12);
	});

	test("empty series", () => {
		const stats = calculatePerformance([]);
		expect(stats.totalReturn).toBe(0);
		expect(stats.annualizedReturn).toBe(0);
		expect(stats.winRate).toBeNull();
		expect(stats.sharpe).toBeNull();
		expect(stats.maxDrawdown).toBe(0);
	});
});
