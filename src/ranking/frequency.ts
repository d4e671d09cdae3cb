import type { FrequencyMap } from "./types.js";

/**
 * Counts the value `extract` pulls out of each entry. Entries for which it
 * returns `undefined` are skipped.
 */
export function buildFrequencyMap<E>(
	entries: Iterable<E>,
	extract: (entry: E) => string | undefined,
): Map<string, number> {
	const counts = new Map<string, number>();
	for (const entry of entries) {
		const key = extract(entry);
		if (key === undefined) continue;
		counts.set(key, (counts.get(key) ?? 0) + 1);
	}
	return counts;
}

/** Frequency map from a plain object, e.g. one decoded from JSON. */
export function frequencyMapFrom(record: Readonly<Record<string, number>>): FrequencyMap {
	return new Map(Object.entries(record));
}
