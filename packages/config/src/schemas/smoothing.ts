import { z } from "zod";

export const SmoothingMethodName = z.enum(["rolling_mean", "rolling_std", "zscore", "ema"]);
export type SmoothingMethodName = z.infer<typeof SmoothingMethodName>;

/** A window left out falls back to the top-level rolling_window */
const WindowSchema = z.number().int().positive().optional();

export const RollingMeanStepSchema = z.object({
	method: z.literal("rolling_mean"),
	window: WindowSchema,
});

export const RollingStdStepSchema = z.object({
	method: z.literal("rolling_std"),
	window: WindowSchema,
});

/** (x - rolling mean) / rolling std over the same trailing window */
export const ZScoreStepSchema = z.object({
	method: z.literal("zscore"),
	window: WindowSchema,
});

/** Recursive form: s_t = alpha * x_t + (1 - alpha) * s_{t-1} */
export const EmaStepSchema = z.object({
	method: z.literal("ema"),
	alpha: z.number().gt(0).max(1).default(0.3),
});

export const SmoothingStepSchema = z.discriminatedUnion("method", [
	RollingMeanStepSchema,
	RollingStdStepSchema,
	ZScoreStepSchema,
	EmaStepSchema,
]);
export type SmoothingStep = z.infer<typeof SmoothingStepSchema>;

/** Steps run in list order; an empty list leaves the factor untouched */
export const SmoothingConfigSchema = z.object({
	enabled: z.boolean().default(false),
	methods: z.array(SmoothingStepSchema).default([]),
});
export type SmoothingConfig = z.infer<typeof SmoothingConfigSchema>;
