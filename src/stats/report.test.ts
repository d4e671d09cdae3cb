import { describe, expect, it } from "vitest";
import { unwrap } from "../shared/result.js";
import { averageLatencyMs, buildWindowedReport } from "./report.js";
import { MemoryStatsStore } from "./store.js";
import type { WindowedReport } from "./types.js";

function allSeries(report: WindowedReport): number[][] {
	return [
		report.dns_queries,
		report.blocked_filtering,
		report.replaced_safebrowsing,
		report.replaced_safesearch,
		report.replaced_parental,
		report.avg_processing_time,
	];
}

const store = unwrap(
	MemoryStatsStore.fromSeries(5, {
		totalRequests: [50, 38, 20, 12, 0],
		filteredLists: [9, 6, 6, 2, 0],
		filteredSafebrowsing: [2, 2, 1, 0, 0],
		filteredSafesearch: [1, 1, 1, 1, 0],
		filteredParental: [4, 3, 2, 1, 0],
		processingTimeSum: [0.5, 0.38, 0.38, 0.1, 0],
		processingTimeCount: [50, 38, 38, 12, 0],
	}),
);

describe("buildWindowedReport", () => {
	it("differences every counter over the full window", () => {
		const report = buildWindowedReport(store, 0, 5);

		expect(report.dns_queries).toEqual([12, 18, 8, 12]);
		expect(report.blocked_filtering).toEqual([3, 0, 4, 2]);
		expect(report.replaced_safebrowsing).toEqual([0, 1, 1, 0]);
		expect(report.replaced_safesearch).toEqual([0, 0, 0, 1]);
		expect(report.replaced_parental).toEqual([1, 1, 1, 1]);
	});

	it("reports per-bucket average latency in milliseconds", () => {
		const report = buildWindowedReport(store, 0, 5);
		const [first, second, third, fourth] = report.avg_processing_time;

		expect(first).toBeCloseTo(10, 9);
		expect(second).toBe(0);
		expect(third).toBeCloseTo(10.769230769, 6);
		expect(fourth).toBeCloseTo(8.333333333, 6);
	});

	it("keeps the documented sign convention for a series growing with index", () => {
		const growing = unwrap(MemoryStatsStore.fromSeries(4, { totalRequests: [0, 5, 12, 20] }));
		expect(buildWindowedReport(growing, 0, 4).dns_queries).toEqual([-5, -7, -8]);
	});

	it("slices the requested sub-window", () => {
		const report = buildWindowedReport(store, 1, 4);
		expect(report.dns_queries).toEqual([18, 8]);
		expect(report.replaced_parental).toEqual([1, 1]);
	});

	it("clamps out-of-range requests", () => {
		expect(buildWindowedReport(store, -5, 1000)).toEqual(buildWindowedReport(store, 0, 5));
	});

	it.each([
		[3, 3],
		[4, 1],
		[0, 1],
		[7, 9],
		[-4, -1],
	])("returns empty series for window (%i, %i)", (start, end) => {
		for (const series of allSeries(buildWindowedReport(store, start, end))) {
			expect(series).toEqual([]);
		}
	});

	it("returns equally long series", () => {
		const lengths = allSeries(buildWindowedReport(store, 1, 5)).map((s) => s.length);
		expect(lengths).toEqual([3, 3, 3, 3, 3, 3]);
	});
});

describe("averageLatencyMs", () => {
	it("is 0 wherever the count delta is 0", () => {
		expect(averageLatencyMs([5, 1, 0], [0, 0, 0])).toEqual([0, 0, 0]);
	});

	it("scales seconds per query to milliseconds", () => {
		expect(averageLatencyMs([2], [4])).toEqual([500]);
	});
});
