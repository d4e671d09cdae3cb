import { bench, describe } from "vitest";
import { unwrap } from "../src/shared/result.js";
import { buildWindowedReport } from "../src/stats/report.js";
import { MemoryStatsStore } from "../src/stats/store.js";
import { COUNTER_METRICS } from "../src/stats/types.js";
import type { CounterMetric } from "../src/stats/types.js";

function generateStore(historyElements: number): MemoryStatsStore {
	const series: Partial<Record<CounterMetric, number[]>> = {};
	for (const metric of COUNTER_METRICS) {
		let total = 0;
		const column: number[] = [];
		for (let i = 0; i < historyElements; i++) {
			total += Math.floor(Math.random() * 100);
			column.push(total);
		}
		series[metric] = column.reverse();
	}
	return unwrap(MemoryStatsStore.fromSeries(historyElements, series));
}

const minuteStore = generateStore(61);
const dayStore = generateStore(1_441);

describe("windowed report", () => {
	bench("full window over 61 buckets", () => {
		buildWindowedReport(minuteStore, 0, 61);
	});

	bench("full window over 1441 buckets", () => {
		buildWindowedReport(dayStore, 0, 1_441);
	});

	bench("clamped out-of-range window", () => {
		buildWindowedReport(dayStore, -100, 10_000);
	});
});
