import type { LoggerOptions } from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface NodeLoggerOptions {
  /** Service name stamped on every line */
  service: string;
  level?: LogLevel;
  /** Deployment environment label (e.g. "RESEARCH", "TEST") */
  environment?: string;
  version?: string;
  /** Human-readable single-line output through pino-pretty */
  pretty?: boolean;
  /** Extra paths to redact, merged with the defaults */
  redactPaths?: string[];
  base?: Record<string, unknown>;
  pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Context bound to every log line of one evaluation run.
 */
export interface RunContext {
  runId: string;
  factorName?: string;
  variant?: string;
}
