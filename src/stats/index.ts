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
} from "./types.js";
export { type BucketWindow, clamp, clampWindow, windowLength } from "./window.js";
export { computeRate } from "./rate.js";
export { summarizeSnapshot } from "./snapshot.js";
export { averageLatencyMs, buildWindowedReport } from "./report.js";
export { type CounterSeriesInput, MAX_HISTORY_ELEMENTS, MemoryStatsStore } from "./store.js";
