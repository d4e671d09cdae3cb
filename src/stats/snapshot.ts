import type { SnapshotSummary, StatsSnapshot } from "./types.js";

/**
 * Flattens the instant snapshot into named totals.
 *
 * Average processing time stays in the store's unit and is 0 when no
 * query has been timed yet.
 */
export function summarizeSnapshot(snapshot: StatsSnapshot): SnapshotSummary {
	const avgProcessingTime =
		snapshot.processingTimeCount > 0
			? snapshot.processingTimeSum / snapshot.processingTimeCount
			: 0;

	return {
		dns_queries: snapshot.totalRequests,
		blocked_filtering: snapshot.filteredLists,
		replaced_safebrowsing: snapshot.filteredSafebrowsing,
		replaced_safesearch: snapshot.filteredSafesearch,
		replaced_parental: snapshot.filteredParental,
		avg_processing_time: avgProcessingTime,
	};
}
