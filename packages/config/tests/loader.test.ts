/**
 * Configuration Loader Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError, loadConfig, loadConfigFromFile } from "../src/index.js";

const CONFIG_DIR = fileURLToPath(new URL("../configs", import.meta.url));

describe("loadConfig", () => {
	it("loads development configuration", async () => {
		const config = await loadConfig("development", CONFIG_DIR);

		expect(config.evaluation.group_count).toBe(5);
		expect(config.evaluation.smoothing.enabled).toBe(true);
		expect(config.evaluation.smoothing.methods).toEqual([{ method: "rolling_mean" }]);
	});

	it("keeps defaults the override does not touch", async () => {
		const config = await loadConfig("development", CONFIG_DIR);

		expect(config.evaluation.long_percentile).toBe(90);
		expect(config.evaluation.rolling_window).toBe(5);
		expect(config.variants.map((v) => v.name)).toEqual([
			"raw",
			"mean-5",
			"mean-5-zscore-20",
			"ema-0.3",
		]);
	});

	it("fills data source defaults", async () => {
		const config = await loadConfig("development", CONFIG_DIR);

		expect(config.data?.factor).toEqual({ path: "data/factor.csv", date_column: "day_date" });
		expect(config.data?.returns.path).toBe("data/returns.csv.gz");
	});

	it("loads production configuration", async () => {
		const config = await loadConfig("production", CONFIG_DIR);

		expect(config.evaluation.invert_factor).toBe(true);
		expect(config.evaluation.benchmark_return).toBe(0.02);
		expect(config.evaluation.group_count).toBe(10);
		expect(config.data).toBeUndefined();
	});

	it("throws on invalid config directory", async () => {
		await expect(loadConfig("development", "/nonexistent/path")).rejects.toThrow(
			"Failed to load YAML",
		);
	});
});

describe("loadConfig with a scratch directory", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "factorlab-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("uses defaults alone when the environment file is missing", async () => {
		await writeFile(join(dir, "default.yaml"), "evaluation:\n  group_count: 4\n");

		const config = await loadConfig("production", dir);
		expect(config.evaluation.group_count).toBe(4);
	});

	it("treats an empty file as an empty document", async () => {
		await writeFile(join(dir, "default.yaml"), "");

		const config = await loadConfig("development", dir);
		expect(config.evaluation.group_count).toBe(10);
	});

	it("rejects invalid values with a ConfigurationError", async () => {
		await writeFile(join(dir, "default.yaml"), "evaluation:\n  group_count: 1\n");

		const promise = loadConfig("development", dir);
		await expect(promise).rejects.toBeInstanceOf(ConfigurationError);
		await expect(promise).rejects.toThrow("evaluation.group_count");
	});

	it("rejects malformed YAML", async () => {
		const path = join(dir, "broken.yaml");
		await writeFile(path, "evaluation: [unclosed\n");

		await expect(loadConfigFromFile(path)).rejects.toThrow("Failed to parse YAML");
	});
});
