export { buildLongOnlyPortfolio, buildLongShortPortfolio } from "./construction.js";
export { averageTurnover, benchmarkReturn, turnoverSeries, weightedReturn } from "./returns.js";
export type { LongOnlyPortfolio, LongShortPortfolio, PortfolioOptions } from "./types.js";
export { longOnlyWeights, longShortWeights } from "./weights.js";
