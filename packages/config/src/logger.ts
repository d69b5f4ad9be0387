import { createNodeLogger, type LifecycleLogger, resolveLogLevel } from "@factorlab/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "config",
	level: resolveLogLevel(process.env.LOG_LEVEL),
	environment: process.env.FACTORLAB_ENV ?? "RESEARCH",
	pretty: process.env.NODE_ENV === "development",
});
