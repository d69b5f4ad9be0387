export type { Logger } from "pino";

export {
  createNodeLogger,
  type LifecycleLogger,
  resolveLogLevel,
  withRunContext,
} from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

