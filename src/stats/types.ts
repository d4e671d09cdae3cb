/**
 * Shared types for the periodic statistics core.
 *
 * Every counter series is indexed by bucket, with index 0 holding the most
 * recent bucket. All series of one store have the same length.
 */

/** The seven counters tracked per bucket and in the instant snapshot. */
export const CounterMetric = {
	TotalRequests: "totalRequests",
	FilteredLists: "filteredLists",
	FilteredSafebrowsing: "filteredSafebrowsing",
	FilteredSafesearch: "filteredSafesearch",
	FilteredParental: "filteredParental",
	ProcessingTimeSum: "processingTimeSum",
	ProcessingTimeCount: "processingTimeCount",
} as const;

export type CounterMetric = (typeof CounterMetric)[keyof typeof CounterMetric];

export const COUNTER_METRICS: readonly CounterMetric[] = Object.values(CounterMetric);

/** One counter per bucket, most recent first. */
export type CounterSeries = readonly number[];

/** Current, non-windowed totals of every counter. */
export type StatsSnapshot = { readonly [M in CounterMetric]: number };

export const EMPTY_SNAPSHOT: StatsSnapshot = {
	totalRequests: 0,
	filteredLists: 0,
	filteredSafebrowsing: 0,
	filteredSafesearch: 0,
	filteredParental: 0,
	processingTimeSum: 0,
	processingTimeCount: 0,
};

/**
 * Read side of the periodic stats store. The owning service mutates the
 * store and is responsible for not doing so while a read is in progress.
 */
export interface PeriodicStatsReader {
	/** Length of every counter series */
	readonly historyElements: number;
	series(metric: CounterMetric): CounterSeries;
	snapshot(): StatsSnapshot;
}

/** Field names shared by the snapshot summary and the windowed report. */
export interface StatsFields<T> {
	readonly dns_queries: T;
	readonly blocked_filtering: T;
	readonly replaced_safebrowsing: T;
	readonly replaced_safesearch: T;
	readonly replaced_parental: T;
	readonly avg_processing_time: T;
}

/** Scalar totals plus average processing time in the store's unit. */
export type SnapshotSummary = StatsFields<number>;

/** Per-bucket deltas plus per-bucket average processing time in milliseconds. */
export type WindowedReport = StatsFields<number[]>;

export type StatsField = keyof StatsFields<unknown>;
