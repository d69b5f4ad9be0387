import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import { type LogLevel, LogLevelSchema, type NodeLoggerOptions, type RunContext } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
  flush(): Promise<void>;
  destroy(): Promise<void>;
}

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
  let state: LoggerState = "active";
  let flushPromise: Promise<void> | null = null;
  const flushBase = baseLogger.flush.bind(baseLogger);

  const flush = async (): Promise<void> => {
    if (state === "destroyed") {
      return;
    }
    if (flushPromise) {
      return flushPromise;
    }
    state = "flushing";
    flushPromise = new Promise<void>((resolve) => {
      flushBase();
      // Give pino time to flush
      setTimeout(() => {
        state = "active";
        flushPromise = null;
        resolve();
      }, 100);
    });
    return flushPromise;
  };

  const destroy = async (): Promise<void> => {
    if (state === "destroyed") {
      return;
    }
    await flush();
    state = "destroyed";
    // A destroyed logger drops every later call
    baseLogger.level = "silent";
  };

  return Object.assign(baseLogger, { flush, destroy });
}

/**
 * Parse a level name from the environment, falling back when it is unset or unknown.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
  const {
    service,
    level = "info",
    environment,
    version,
    pretty,
    redactPaths,
    base = {},
    pinoOptions = {},
  } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
    // An explicit base leaves out pid and hostname
    base: {
      service,
      environment,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  let baseLogger: Logger;

  if (isPretty) {
    baseLogger = pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,environment,version",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  } else {
    baseLogger = pino(loggerOptions);
  }

  return wrapLoggerWithLifecycle(baseLogger);
}

export function withRunContext(logger: Logger, context: RunContext): Logger {
  return logger.child({
    runId: context.runId,
    factorName: context.factorName,
    variant: context.variant,
  });
}
