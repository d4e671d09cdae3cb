import type { CounterSeries } from "./types.js";

/**
 * Adjacent differences of a most-recent-first series.
 *
 * `out[k] = series[k] - series[k + 1]`, so the result is one shorter than
 * the input and empty for zero or one element.
 */
export function computeRate(series: CounterSeries): number[] {
	const output: number[] = [];
	for (let i = 0; i + 1 < series.length; i++) {
		output.push((series[i] ?? 0) - (series[i + 1] ?? 0));
	}
	return output;
}
