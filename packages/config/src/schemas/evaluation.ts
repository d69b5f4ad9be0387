import { z } from "zod";
import { SmoothingConfigSchema } from "./smoothing.js";

const Percentile = z.number().min(0).max(100);

export const EvaluationConfigObjectSchema = z.object({
	/** Number of quantile buckets */
	group_count: z.number().int().min(2).default(10),
	/** Long leg: factor at or above this percentile */
	long_percentile: Percentile.default(90),
	/** Short leg: factor at or below this percentile */
	short_percentile: Percentile.default(10),
	/** Default trailing window for smoothing steps */
	rolling_window: z.number().int().positive().default(5),
	/** Annual benchmark (risk-free) rate used by the Sharpe ratios */
	benchmark_return: z.number().default(0),
	/**
	 * Negate the factor before evaluation, for factors where a higher value
	 * predicts a lower return.
	 */
	invert_factor: z.boolean().default(false),
	/** Fewer valid factor values than this yields an all-zero weight row */
	min_portfolio_breadth: z.number().int().positive().default(10),
	periods_per_year: z.number().positive().default(252),
	smoothing: SmoothingConfigSchema.default({}),
});

export const EvaluationConfigSchema = EvaluationConfigObjectSchema.refine(
	(config) => config.short_percentile < config.long_percentile,
	{
		message: "short_percentile must be below long_percentile",
		path: ["short_percentile"],
	},
);
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;
export type EvaluationConfigInput = z.input<typeof EvaluationConfigSchema>;
