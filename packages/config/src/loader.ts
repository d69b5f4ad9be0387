/**
 * Configuration Loader
 *
 * Loads and merges YAML configuration files with environment-specific overrides.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "yaml";
import { ConfigurationError } from "./errors.js";
import { log } from "./logger.js";
import { type FactorlabConfig, mergeConfigLayers, validateConfigOrThrow } from "./validate.js";

/**
 * Environment type for config loading
 */
export type ConfigEnvironment = "development" | "production";

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load and parse a YAML file. An optional file that does not exist yields
 * undefined.
 *
 * @throws ConfigurationError if the file cannot be read or parsed
 */
async function loadYaml(path: string, optional = false): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (optional && isMissingFile(error)) {
			return undefined;
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(`Failed to load YAML from ${path}: ${message}`, [], path);
	}
	try {
		return parse(content) ?? {};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(`Failed to parse YAML in ${path}: ${message}`, [], path);
	}
}

/**
 * Load configuration with environment-specific overrides
 *
 * Loads base configuration from default.yaml, then merges with
 * environment-specific overrides (development.yaml or production.yaml).
 * Lists in the override replace the base lists.
 *
 * @throws ConfigurationError if a file is unreadable or validation fails
 */
export async function loadConfig(
	environment: ConfigEnvironment,
	configDir = "configs",
): Promise<FactorlabConfig> {
	const base = await loadYaml(join(configDir, "default.yaml"));

	let override = await loadYaml(join(configDir, `${environment}.yaml`), true);
	if (override === undefined) {
		log.warn({ configDir, environment }, `No ${environment}.yaml found, using defaults only`);
		override = {};
	}

	const merged: unknown = mergeConfigLayers(base, override);
	return validateConfigOrThrow(merged, configDir);
}

/**
 * Load configuration from a single file, without overrides
 */
export async function loadConfigFromFile(path: string): Promise<FactorlabConfig> {
	const content = await loadYaml(path);
	return validateConfigOrThrow(content, path);
}

/**
 * Load configuration for the environment named by FACTORLAB_ENV / NODE_ENV
 */
export async function loadConfigWithEnv(configDir = "configs"): Promise<FactorlabConfig> {
	const environment: ConfigEnvironment =
		process.env.FACTORLAB_ENV === "PRODUCTION" || process.env.NODE_ENV === "production"
			? "production"
			: "development";

	return loadConfig(environment, configDir);
}
