/**
 * Config-driven evaluation: read the configured panels, evaluate the base
 * configuration, then every configured variant.
 */

import { resolve } from "node:path";
import {
  ConfigurationError,
  type DataConfig,
  type FactorlabConfig,
  type PanelSource,
} from "@factorlab/config";
import { type BatchEvaluation, evaluateVariants } from "./batch.js";
import { type EvaluateFactorOptions, evaluateFactor } from "./evaluator.js";
import { readPanelFile } from "./io/csv.js";
import type { Panel } from "./panel/types.js";
import type { FactorEvaluationResult } from "./types.js";

export interface ConfiguredRun {
  result: FactorEvaluationResult;
  /** Null when no variants are configured */
  batch: BatchEvaluation | null;
}

export interface RunOptions extends EvaluateFactorOptions {
  /** Directory relative data paths resolve against (default: cwd) */
  baseDir?: string;
}

function readSource(source: PanelSource, baseDir: string, name: string): Promise<Panel> {
  return readPanelFile(resolve(baseDir, source.path), {
    dateColumn: source.date_column,
    delimiter: source.delimiter,
    name,
  });
}

export async function loadPanels(
  data: DataConfig,
  baseDir = process.cwd()
): Promise<{ factor: Panel; returns: Panel }> {
  const [factor, returns] = await Promise.all([
    readSource(data.factor, baseDir, "factor"),
    readSource(data.returns, baseDir, "returns"),
  ]);
  return { factor, returns };
}

/**
 * @throws ConfigurationError if the config has no data section
 */
export async function runConfiguredEvaluation(
  config: FactorlabConfig,
  options: RunOptions = {}
): Promise<ConfiguredRun> {
  if (!config.data) {
    throw new ConfigurationError("No data section configured", [
      { path: "data", message: "Required" },
    ]);
  }

  const { baseDir, ...evaluateOptions } = options;
  const { factor, returns } = await loadPanels(config.data, baseDir);

  const result = evaluateFactor(factor, returns, config.evaluation, evaluateOptions);
  const batch =
    config.variants.length > 0
      ? evaluateVariants(factor, returns, config.evaluation, config.variants, evaluateOptions)
      : null;

  return { result, batch };
}
