/**
 * Package configuration.
 *
 * `historyElements` replaces the fixed global history length of the
 * periodic stats buffer: it belongs to the store and is handed to the
 * window clamp explicitly.
 */

import { LOG_LEVELS } from "../lib/logger/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import type { Result } from "./result.js";

export interface StatsConfig {
	/** Number of buckets in every periodic counter series */
	readonly historyElements: number;
	/** Default number of entries returned by top-N rankings */
	readonly topLimit: number;
	readonly logLevel: LogLevel;
}

// Sixty one-minute deltas need sixty-one buckets.
export const DEFAULT_STATS_CONFIG: StatsConfig = {
	historyElements: 61,
	topLimit: 50,
	logLevel: "info",
};

const logLevelSchema = z.custom<LogLevel>(
	(value) => typeof value === "string" && LOG_LEVELS.some((level) => level === value),
	{ message: `logLevel must be one of ${LOG_LEVELS.join(", ")}` },
);

export const statsConfigSchema = z.object({
	historyElements: z.number().int().min(1).max(1_000_000),
	topLimit: z.number().int().min(0),
	logLevel: logLevelSchema,
});

/** Merge overrides onto the defaults and validate the result. */
export function resolveConfig(
	overrides: Partial<StatsConfig> = {},
): Result<StatsConfig, ValidationError> {
	return validate(statsConfigSchema, { ...DEFAULT_STATS_CONFIG, ...overrides }, "Invalid stats config");
}

/** Mutable builder shape for assembling Partial<StatsConfig>. */
interface MutableStatsConfig {
	historyElements?: number;
	topLimit?: number;
	logLevel?: LogLevel;
}

/**
 * Reads config values from environment variables.
 * Supported: DNS_STATS_HISTORY_ELEMENTS, DNS_STATS_TOP_LIMIT, DNS_STATS_LOG_LEVEL.
 * @throws ConfigError if a variable is set to an unusable value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<StatsConfig> {
	const result: MutableStatsConfig = {};

	const historyElements = parseIntEnv(env, "DNS_STATS_HISTORY_ELEMENTS", 1);
	if (historyElements !== undefined) result.historyElements = historyElements;

	const topLimit = parseIntEnv(env, "DNS_STATS_TOP_LIMIT", 0);
	if (topLimit !== undefined) result.topLimit = topLimit;

	const rawLevel = env["DNS_STATS_LOG_LEVEL"];
	if (rawLevel) {
		const level = LOG_LEVELS.find((l) => l === rawLevel.trim().toLowerCase());
		if (level === undefined) {
			throw new ConfigError(`Invalid DNS_STATS_LOG_LEVEL: "${rawLevel}"`, {
				allowed: LOG_LEVELS,
			});
		}
		result.logLevel = level;
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer >= ${min}`);
	}
	return parsed;
}
