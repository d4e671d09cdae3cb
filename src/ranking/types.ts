/** Observation count per key (host, client or block reason). */
export type FrequencyMap = ReadonlyMap<string, number>;

/** Top entries of a FrequencyMap; iteration order is the ranking order. */
export type RankedMap = Map<string, number>;
