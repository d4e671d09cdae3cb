/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Client identifiers are end-user addresses, so `client` and `clientId`
 * fields are censored unless the caller supplies its own redaction list.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export const DEFAULT_REDACT_PATHS: readonly string[] = ["client", "clientId", "*.client"];

export interface LoggerConfig {
	readonly level: LogLevel;
	/** Logger name, emitted as the `name` field on every line */
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "info" | "warn" | "error" | "debug";

function emit(
	pinoLogger: pino.Logger,
	method: PinoMethod,
	msgOrObj: Record<string, unknown> | string,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		pinoLogger[method](msgOrObj);
	} else {
		pinoLogger[method](msgOrObj, msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: Record<string, unknown> | string, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: Record<string, unknown> | string, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: Record<string, unknown> | string, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: Record<string, unknown> | string, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "dns-stats" });
 * logger.info({ start: 0, end: 61 }, "report built");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	const redactPaths = config.redactPaths ?? DEFAULT_REDACT_PATHS;
	if (redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that drops everything; the default when a caller does not inject one. */
export function silentLogger(): Logger {
	return createLogger({ level: "fatal", destination: { write(): void {} } });
}
