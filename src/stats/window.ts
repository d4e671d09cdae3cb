/** A half-open `[start, end)` range of bucket indices. */
export interface BucketWindow {
	readonly start: number;
	readonly end: number;
}

export function clamp(value: number, low: number, high: number): number {
	if (value < low) return low;
	if (value > high) return high;
	return value;
}

function toIndex(value: number): number {
	return Number.isNaN(value) ? 0 : Math.trunc(value);
}

/**
 * Bounds a requested window to `[0, historyElements]`.
 *
 * Each end is clamped on its own; `start > end` is passed through and
 * yields an empty slice downstream.
 */
export function clampWindow(start: number, end: number, historyElements: number): BucketWindow {
	return {
		start: clamp(toIndex(start), 0, historyElements),
		end: clamp(toIndex(end), 0, historyElements),
	};
}

/** Number of buckets a clamped window covers; 0 for empty or inverted windows. */
export function windowLength(window: BucketWindow): number {
	return Math.max(window.end - window.start, 0);
}
