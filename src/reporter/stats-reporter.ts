/**
 * StatsReporter — binds a stats store, a logger and the configured top-N
 * limit behind the operations the HTTP layer serves.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { countEntryField } from "../querylog/entry-fields.js";
import type { EntryField } from "../querylog/entry-fields.js";
import type { DecodedValue } from "../querylog/decoded-value.js";
import { produceTop } from "../ranking/top-n.js";
import type { FrequencyMap, RankedMap } from "../ranking/types.js";
import { DEFAULT_STATS_CONFIG } from "../shared/config.js";
import { buildWindowedReport } from "../stats/report.js";
import { summarizeSnapshot } from "../stats/snapshot.js";
import type { PeriodicStatsReader, SnapshotSummary, WindowedReport } from "../stats/types.js";
import { clampWindow, windowLength } from "../stats/window.js";

export interface StatsReporterConfig {
	readonly store: PeriodicStatsReader;
	readonly logger?: Logger;
	readonly topLimit?: number;
}

export class StatsReporter {
	private readonly store: PeriodicStatsReader;
	private readonly logger: Logger;
	private readonly topLimit: number;

	constructor(config: StatsReporterConfig) {
		this.store = config.store;
		this.logger = (config.logger ?? silentLogger()).child({ component: "stats-reporter" });
		this.topLimit = config.topLimit ?? DEFAULT_STATS_CONFIG.topLimit;
	}

	/** Per-bucket deltas for `[start, end)`; out-of-range requests are clamped, never rejected. */
	report(start: number, end: number): WindowedReport {
		const window = clampWindow(start, end, this.store.historyElements);
		if (window.start !== start || window.end !== end) {
			this.logger.debug({ requested: { start, end }, clamped: window }, "window clamped");
		}
		if (windowLength(window) < 2) {
			this.logger.debug({ start: window.start, end: window.end }, "window too short for deltas");
		}
		return buildWindowedReport(this.store, window.start, window.end);
	}

	summary(): SnapshotSummary {
		return summarizeSnapshot(this.store.snapshot());
	}

	top(frequencies: FrequencyMap, n: number = this.topLimit): RankedMap {
		return produceTop(frequencies, n);
	}

	/** Ranks one field (`host`, `reason` or `client`) across decoded log entries. */
	topOf(entries: Iterable<DecodedValue>, field: EntryField, n: number = this.topLimit): RankedMap {
		const frequencies = countEntryField(entries, field);
		const ranked = produceTop(frequencies, n);
		this.logger.debug({ field, distinct: frequencies.size, returned: ranked.size }, "ranked entries");
		return ranked;
	}
}
