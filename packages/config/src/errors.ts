/**
 * Configuration Errors
 */

import type { ZodError } from "zod";

export interface ConfigIssue {
	path: string;
	message: string;
}

export class ConfigurationError extends Error {
	readonly code = "INVALID_CONFIG" as const;

	constructor(
		message: string,
		public readonly issues: readonly ConfigIssue[] = [],
		public readonly source?: string,
	) {
		super(message);
		this.name = "ConfigurationError";
	}

	static fromZod(error: ZodError, source?: string): ConfigurationError {
		const issues = error.issues.map((issue) => ({
			path: issue.path.join("."),
			message: issue.message,
		}));
		const where = source ? ` in ${source}` : "";
		const details = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
		return new ConfigurationError(`Invalid configuration${where}: ${details}`, issues, source);
	}
}
