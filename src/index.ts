// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	unwrap,
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
	type StatsConfig,
	DEFAULT_STATS_CONFIG,
	statsConfigSchema,
	resolveConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	LOG_LEVELS,
	DEFAULT_REDACT_PATHS,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { type ValidationIssue, ValidationError, validate } from "./lib/validation/index.js";

// ── Periodic Stats ───────────────────────────────────────────────────
export {
	CounterMetric,
	COUNTER_METRICS,
	EMPTY_SNAPSHOT,
	type CounterSeries,
	type StatsSnapshot,
	type PeriodicStatsReader,
	type StatsFields,
	type StatsField,
	type SnapshotSummary,
	type WindowedReport,
	type BucketWindow,
	clamp,
	clampWindow,
	windowLength,
	computeRate,
	summarizeSnapshot,
	averageLatencyMs,
	buildWindowedReport,
	type CounterSeriesInput,
	MAX_HISTORY_ELEMENTS,
	MemoryStatsStore,
} from "./stats/index.js";

// ── Ranking ──────────────────────────────────────────────────────────
export {
	type FrequencyMap,
	type RankedMap,
	sortByValue,
	produceTop,
	buildFrequencyMap,
	frequencyMapFrom,
} from "./ranking/index.js";

// ── Query Log ────────────────────────────────────────────────────────
export {
	type DecodedValue,
	ABSENT,
	decode,
	fieldAt,
	stringAt,
	numberAt,
	type EntryField,
	ENTRY_FIELD_ACCESSORS,
	getHost,
	getReason,
	getClient,
	countEntryField,
} from "./querylog/index.js";

// ── HTTP Boundary ────────────────────────────────────────────────────
export {
	type BodyParameters,
	parseParameters,
	parseParametersFromStream,
	type HttpMethod,
	type RequestLike,
	type ResponseLike,
	type Handler,
	type GuardOptions,
	writeError,
	ensureMethod,
	ensureGET,
	ensurePOST,
	ensurePUT,
	ensureDELETE,
} from "./http/index.js";

// ── Reporter ─────────────────────────────────────────────────────────
export { type StatsReporterConfig, StatsReporter } from "./reporter/index.js";
