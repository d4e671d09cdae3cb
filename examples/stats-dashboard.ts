/**
 * Stats dashboard walk-through
 *
 * - Fills an in-memory store with an hour of synthetic cumulative counters
 * - Prints the last ten per-minute rates and average latencies
 * - Ranks hosts, clients and block reasons from a synthetic query log
 */

import {
	MemoryStatsStore,
	StatsReporter,
	configFromEnv,
	createLogger,
	decode,
	resolveConfig,
	unwrap,
} from "../src/index.js";
import type { CounterMetric, DecodedValue } from "../src/index.js";

const config = unwrap(resolveConfig(configFromEnv()));
const logger = createLogger({ level: config.logLevel, name: "stats-dashboard" });

function cumulative(buckets: number, perBucket: () => number): number[] {
	const column: number[] = [];
	let total = 0;
	for (let i = 0; i < buckets; i++) {
		total += perBucket();
		column.push(total);
	}
	// Most recent bucket first.
	return column.reverse();
}

const queriesPerMinute = (): number => 200 + Math.floor(Math.random() * 100);

const series: Partial<Record<CounterMetric, number[]>> = {
	totalRequests: cumulative(config.historyElements, queriesPerMinute),
	filteredLists: cumulative(config.historyElements, () => Math.floor(Math.random() * 30)),
	filteredSafebrowsing: cumulative(config.historyElements, () => Math.floor(Math.random() * 3)),
	processingTimeSum: cumulative(config.historyElements, () => Math.random() * 2),
	processingTimeCount: cumulative(config.historyElements, queriesPerMinute),
};

const store = unwrap(MemoryStatsStore.fromSeries(config.historyElements, series));
const reporter = new StatsReporter({ store, logger, topLimit: config.topLimit });

const report = reporter.report(0, 11);
console.log("Last ten minutes");
report.dns_queries.forEach((queries, minute) => {
	const blocked = report.blocked_filtering[minute] ?? 0;
	const latency = report.avg_processing_time[minute] ?? 0;
	console.log(`  -${minute + 1}m  queries=${queries}  blocked=${blocked}  avg=${latency.toFixed(2)}ms`);
});

const hosts = ["ads.example", "cdn.example", "mail.example", "tracker.example", "news.example"];
const reasons = ["NotFilteredNotFound", "FilteredBlackList", "FilteredSafeBrowsing"];
const log: DecodedValue[] = Array.from({ length: 500 }, (_, i) =>
	decode({
		question: { host: hosts[Math.floor(Math.random() * hosts.length)], type: "A" },
		client: `192.0.2.${(i % 7) + 1}`,
		reason: reasons[Math.floor(Math.random() * reasons.length)],
	}),
);

for (const field of ["host", "client", "reason"] as const) {
	console.log(`Top ${field}s`, Object.fromEntries(reporter.topOf(log, field, 3)));
}
