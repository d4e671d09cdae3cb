export type { FrequencyMap, RankedMap } from "./types.js";
export { sortByValue, produceTop } from "./top-n.js";
export { buildFrequencyMap, frequencyMapFrom } from "./frequency.js";
