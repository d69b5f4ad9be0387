/**
 * @factorlab/config
 *
 * Evaluation configuration schemas, validation and YAML loading.
 *
 * @example
 * ```ts
 * import { loadConfig, parseEvaluationConfig } from "@factorlab/config";
 *
 * const config = await loadConfig("development", "configs");
 * const evaluation = parseEvaluationConfig({ group_count: 5 });
 * ```
 */

export { type ConfigIssue, ConfigurationError } from "./errors.js";
export {
	type ConfigEnvironment,
	loadConfig,
	loadConfigFromFile,
	loadConfigWithEnv,
} from "./loader.js";
export * from "./schemas/index.js";
export {
	type FactorlabConfig,
	FactorlabConfigSchema,
	mergeConfigLayers,
	mergeEvaluationConfig,
	parseEvaluationConfig,
	safeParseEvaluationConfig,
	type ValidationResult,
	validateConfigOrThrow,
} from "./validate.js";
