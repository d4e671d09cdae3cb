/**
 * MemoryStatsStore — in-memory periodic stats store.
 *
 * Holds one fixed-length series per counter plus the current snapshot.
 * Writing buckets is the owning service's job; this class only checks
 * that what it is handed keeps every series the same length.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { map } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { COUNTER_METRICS, EMPTY_SNAPSHOT } from "./types.js";
import type { CounterMetric, CounterSeries, PeriodicStatsReader, StatsSnapshot } from "./types.js";
import { clamp } from "./window.js";

/** Largest history a store allocates; matches the config schema's bound. */
export const MAX_HISTORY_ELEMENTS = 1_000_000;

export type CounterSeriesInput = Partial<Record<CounterMetric, readonly number[]>>;

const counter = z.number().finite();

function storeInputSchema(historyElements: number) {
	const series = z.array(counter).length(historyElements, {
		message: `series must have exactly ${historyElements} buckets`,
	});
	return z.object({
		historyElements: z.number().int().min(1),
		series: z
			.object({
				totalRequests: series.optional(),
				filteredLists: series.optional(),
				filteredSafebrowsing: series.optional(),
				filteredSafesearch: series.optional(),
				filteredParental: series.optional(),
				processingTimeSum: series.optional(),
				processingTimeCount: series.optional(),
			})
			.strict(),
		snapshot: z
			.object({
				totalRequests: counter,
				filteredLists: counter,
				filteredSafebrowsing: counter,
				filteredSafesearch: counter,
				filteredParental: counter,
				processingTimeSum: counter,
				processingTimeCount: counter,
			})
			.optional(),
	});
}

function zeroSeries(historyElements: number): number[] {
	return new Array<number>(historyElements).fill(0);
}

export class MemoryStatsStore implements PeriodicStatsReader {
	readonly historyElements: number;
	private readonly buckets: ReadonlyMap<CounterMetric, readonly number[]>;
	private current: StatsSnapshot;

	private constructor(
		historyElements: number,
		buckets: ReadonlyMap<CounterMetric, readonly number[]>,
		snapshot: StatsSnapshot,
	) {
		this.historyElements = historyElements;
		this.buckets = buckets;
		this.current = snapshot;
	}

	/**
	 * A store whose series and snapshot are all zero. The size is truncated
	 * and bounded to `[1, MAX_HISTORY_ELEMENTS]`; `NaN` gives one bucket.
	 */
	static create(historyElements: number): MemoryStatsStore {
		const size = Number.isNaN(historyElements)
			? 1
			: clamp(Math.trunc(historyElements), 1, MAX_HISTORY_ELEMENTS);
		const buckets = new Map<CounterMetric, readonly number[]>();
		for (const metric of COUNTER_METRICS) {
			buckets.set(metric, Object.freeze(zeroSeries(size)));
		}
		return new MemoryStatsStore(size, buckets, EMPTY_SNAPSHOT);
	}

	/**
	 * A store pre-filled with the given series (most recent bucket first).
	 * Metrics left out are zero-filled; every given series must have exactly
	 * `historyElements` finite values.
	 */
	static fromSeries(
		historyElements: number,
		series: CounterSeriesInput,
		snapshot?: StatsSnapshot,
	): Result<MemoryStatsStore, ValidationError> {
		const parsed = validate(
			storeInputSchema(historyElements),
			{ historyElements, series, snapshot },
			"Invalid stats store contents",
		);

		return map(parsed, (input) => {
			const buckets = new Map<CounterMetric, readonly number[]>();
			for (const metric of COUNTER_METRICS) {
				const given = input.series[metric];
				buckets.set(metric, Object.freeze(given ? [...given] : zeroSeries(input.historyElements)));
			}
			return new MemoryStatsStore(input.historyElements, buckets, input.snapshot ?? EMPTY_SNAPSHOT);
		});
	}

	series(metric: CounterMetric): CounterSeries {
		return this.buckets.get(metric) ?? zeroSeries(this.historyElements);
	}

	snapshot(): StatsSnapshot {
		return this.current;
	}

	/** Replace the instant snapshot, e.g. after a bucket completes. */
	setSnapshot(snapshot: StatsSnapshot): void {
		this.current = { ...snapshot };
	}
}
