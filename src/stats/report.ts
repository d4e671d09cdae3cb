/**
 * Windowed report builder — per-bucket deltas for every tracked counter.
 *
 * All series of one report are cut from the same clamped window and run
 * through the same differencing, so they always have equal length:
 * `max(end' - start' - 1, 0)`.
 */

import { computeRate } from "./rate.js";
import { CounterMetric } from "./types.js";
import type { CounterSeries, PeriodicStatsReader, WindowedReport } from "./types.js";
import { clampWindow } from "./window.js";
import type { BucketWindow } from "./window.js";

const MS_PER_SECOND = 1000;

function deltas(store: PeriodicStatsReader, metric: CounterMetric, window: BucketWindow): number[] {
	return computeRate(store.series(metric).slice(window.start, window.end));
}

/**
 * Per-bucket average latency in milliseconds from the deltas of the
 * processing-time sum (seconds) and count. Buckets without timed queries
 * report 0.
 */
export function averageLatencyMs(sumDeltas: CounterSeries, countDeltas: CounterSeries): number[] {
	const averages: number[] = [];
	for (let i = 0; i < countDeltas.length; i++) {
		const count = countDeltas[i] ?? 0;
		averages.push(count === 0 ? 0 : ((sumDeltas[i] ?? 0) / count) * MS_PER_SECOND);
	}
	return averages;
}

/** Builds the time-series report for the requested `[start, end)` bucket range. */
export function buildWindowedReport(
	store: PeriodicStatsReader,
	start: number,
	end: number,
): WindowedReport {
	const window = clampWindow(start, end, store.historyElements);

	const countDeltas = deltas(store, CounterMetric.ProcessingTimeCount, window);
	const sumDeltas = deltas(store, CounterMetric.ProcessingTimeSum, window);

	return {
		dns_queries: deltas(store, CounterMetric.TotalRequests, window),
		blocked_filtering: deltas(store, CounterMetric.FilteredLists, window),
		replaced_safebrowsing: deltas(store, CounterMetric.FilteredSafebrowsing, window),
		replaced_safesearch: deltas(store, CounterMetric.FilteredSafesearch, window),
		replaced_parental: deltas(store, CounterMetric.FilteredParental, window),
		avg_processing_time: averageLatencyMs(sumDeltas, countDeltas),
	};
}
