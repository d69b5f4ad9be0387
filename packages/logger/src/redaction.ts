/**
 * Paths scrubbed from every log line. Configuration objects are logged
 * whole, and some of them carry connection credentials for data sources.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "password",
  "*.password",
  "token",
  "*.token",
  "apiKey",
  "*.apiKey",
  "secret",
  "*.secret",
  "headers.authorization",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
