/**
 * Top-N ranking of frequency maps.
 *
 * Keys are ordered by descending count. Equal counts are ordered by key,
 * ascending by UTF-16 code unit, so the same input always ranks the same way.
 */

import type { FrequencyMap, RankedMap } from "./types.js";

function compareKeys(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

/** All keys of `frequencies`, highest count first. */
export function sortByValue(frequencies: FrequencyMap): string[] {
	const pairs = [...frequencies.entries()];
	pairs.sort(([keyA, countA], [keyB, countB]) => countB - countA || compareKeys(keyA, keyB));
	return pairs.map(([key]) => key);
}

/**
 * The `top` highest-count entries as a new map in ranking order.
 * `top <= 0` gives an empty map; a limit above the key count returns every key.
 */
export function produceTop(frequencies: FrequencyMap, top: number): RankedMap {
	const ranked: RankedMap = new Map();
	const limit = Number.isNaN(top) ? 0 : Math.trunc(top);
	if (limit <= 0) return ranked;

	for (const key of sortByValue(frequencies)) {
		if (ranked.size >= limit) break;
		ranked.set(key, frequencies.get(key) ?? 0);
	}
	return ranked;
}
