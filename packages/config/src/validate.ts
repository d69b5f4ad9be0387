/**
 * Configuration Validation
 *
 * The complete file schema plus the parse helpers every evaluation call
 * goes through. Nothing here keeps process-wide defaults: callers pass
 * their configuration explicitly and get a fresh validated value back.
 */

import { deepmergeCustom } from "deepmerge-ts";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DataConfigSchema, VariantSchema } from "./schemas/data.js";
import { type EvaluationConfig, EvaluationConfigSchema } from "./schemas/evaluation.js";

export const FactorlabConfigSchema = z.object({
	evaluation: EvaluationConfigSchema.default({}),
	/** Where the factor and return panels are read from */
	data: DataConfigSchema.optional(),
	/** Parameter variants for batch evaluation */
	variants: z.array(VariantSchema).default([]),
});
export type FactorlabConfig = z.infer<typeof FactorlabConfigSchema>;

export type ValidationResult<T> =
	| { success: true; data: T; errors: [] }
	| { success: false; errors: string[] };

/**
 * Deep merge where arrays (e.g. smoothing methods) are replaced, not concatenated
 */
export const mergeConfigLayers = deepmergeCustom({ mergeArrays: false });

export function safeParseEvaluationConfig(input: unknown): ValidationResult<EvaluationConfig> {
	const result = EvaluationConfigSchema.safeParse(input ?? {});

	if (result.success) {
		return { success: true, data: result.data, errors: [] };
	}

	return {
		success: false,
		errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
	};
}

/**
 * Validate an evaluation config, filling defaults.
 *
 * @throws ConfigurationError if validation fails
 */
export function parseEvaluationConfig(input: unknown): EvaluationConfig {
	const result = EvaluationConfigSchema.safeParse(input ?? {});
	if (!result.success) {
		throw ConfigurationError.fromZod(result.error, "evaluation");
	}
	return result.data;
}

/**
 * Apply overrides on top of a base evaluation config and validate the result.
 *
 * @throws ConfigurationError if the merged config is invalid
 */
export function mergeEvaluationConfig(base: unknown, overrides: unknown): EvaluationConfig {
	const merged: unknown = mergeConfigLayers(base ?? {}, overrides ?? {});
	return parseEvaluationConfig(merged);
}

/**
 * Validate a whole configuration document.
 *
 * @throws ConfigurationError if validation fails
 */
export function validateConfigOrThrow(config: unknown, source?: string): FactorlabConfig {
	const result = FactorlabConfigSchema.safeParse(config ?? {});
	if (!result.success) {
		throw ConfigurationError.fromZod(result.error, source);
	}
	return result.data;
}
