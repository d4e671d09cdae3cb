import { bench, describe } from "vitest";
import { produceTop } from "../src/ranking/top-n.js";

function generateFrequencies(keys: number): Map<string, number> {
	const frequencies = new Map<string, number>();
	for (let i = 0; i < keys; i++) {
		frequencies.set(`host-${i}.example`, Math.floor(Math.random() * 10_000));
	}
	return frequencies;
}

const small = generateFrequencies(1_000);
const large = generateFrequencies(50_000);

describe("top-N ranking", () => {
	bench("top 50 of 1k hosts", () => {
		produceTop(small, 50);
	});

	bench("top 50 of 50k hosts", () => {
		produceTop(large, 50);
	});

	bench("all of 1k hosts", () => {
		produceTop(small, small.size);
	});
});
