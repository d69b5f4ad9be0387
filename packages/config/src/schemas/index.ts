export * from "./data.js";
export * from "./evaluation.js";
export * from "./smoothing.js";
