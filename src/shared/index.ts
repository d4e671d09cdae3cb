export {
	type Result,
	ok,
	err,
	map,
	unwrap,
} from "./result.js";

export {
	ErrorCategory,
	StatsError,
	MalformedInputError,
	MethodNotAllowedError,
	ConfigError,
	SystemError,
	classifyError,
	httpStatusOf,
	isMalformedInput,
	isMethodNotAllowed,
	isConfigError,
	isSystemError,
} from "./errors.js";

export {
	type StatsConfig,
	DEFAULT_STATS_CONFIG,
	statsConfigSchema,
	resolveConfig,
	configFromEnv,
} from "./config.js";
