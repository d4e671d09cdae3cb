/**
 * StatsError hierarchy — structured error classification for the service boundary.
 *
 * The statistics core has no failing operations. Errors only appear where
 * client-supplied input or operator configuration enters the package. None
 * of them is transient: the category separates bad input from a broken
 * deployment.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface StatsErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for every failure this package reports. */
export class StatsError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "StatsError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Client-supplied input that cannot be parsed, e.g. a body line without `=`. */
export class MalformedInputError extends StatsError {
	constructor(message: string, context: Record<string, unknown> & StatsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "MALFORMED_INPUT", ErrorCategory.NonRetryable, rest);
		this.name = "MalformedInputError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A request arrived with a method the endpoint does not serve. */
export class MethodNotAllowedError extends StatsError {
	readonly allowed: string;

	constructor(allowed: string, actual: string | undefined) {
		super(`This request must be ${allowed}`, "METHOD_NOT_ALLOWED", ErrorCategory.NonRetryable, {
			allowed,
			actual: actual ?? null,
		});
		this.name = "MethodNotAllowedError";
		this.allowed = allowed;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends StatsError {
	constructor(message: string, context: Record<string, unknown> & StatsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Unexpected internal failure. */
export class SystemError extends StatsError {
	constructor(message: string, context: Record<string, unknown> & StatsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helpers ───────────────────────────────────────────

/** Wrap anything thrown by foreign code into a StatsError. */
export function classifyError(error: unknown): StatsError {
	if (error instanceof StatsError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

const HTTP_STATUS_BY_CODE: Readonly<Record<string, number>> = {
	MALFORMED_INPUT: 400,
	VALIDATION_FAILED: 400,
	METHOD_NOT_ALLOWED: 405,
};

/** HTTP status a transport layer should answer with for the given error. */
export function httpStatusOf(error: StatsError): number {
	return HTTP_STATUS_BY_CODE[error.code] ?? 500;
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for MalformedInputError. */
export function isMalformedInput(e: unknown): e is MalformedInputError {
	return e instanceof MalformedInputError;
}

/** Type guard for MethodNotAllowedError. */
export function isMethodNotAllowed(e: unknown): e is MethodNotAllowedError {
	return e instanceof MethodNotAllowedError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
