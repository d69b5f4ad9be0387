export { analyzeICDecay, evaluateIC, interpretIC } from "./analysis.js";
export { computeICSeries, crossSectionalIC, cumulativeIC, summarizeICSeries } from "./metrics.js";
export { computeRanks, pearsonCorrelation, spearmanCorrelation } from "./statistics.js";
export * from "./types.js";
