/**
 * Field accessors for decoded query-log entries.
 *
 * Each returns `undefined` when the field is missing, not a string, or
 * empty, so the entry contributes nothing to a frequency map.
 */

import { buildFrequencyMap } from "../ranking/frequency.js";
import { stringAt } from "./decoded-value.js";
import type { DecodedValue } from "./decoded-value.js";

export type EntryField = "host" | "reason" | "client";

function nonEmpty(value: string | undefined): string | undefined {
	return value === "" ? undefined : value;
}

/** Queried host name, from `question.host`. */
export function getHost(entry: DecodedValue): string | undefined {
	return nonEmpty(stringAt(entry, "question", "host"));
}

/** Filtering reason recorded for the query. */
export function getReason(entry: DecodedValue): string | undefined {
	return nonEmpty(stringAt(entry, "reason"));
}

/** Client identifier (usually an address) that sent the query. */
export function getClient(entry: DecodedValue): string | undefined {
	return nonEmpty(stringAt(entry, "client"));
}

export const ENTRY_FIELD_ACCESSORS: Readonly<
	Record<EntryField, (entry: DecodedValue) => string | undefined>
> = {
	host: getHost,
	reason: getReason,
	client: getClient,
};

/** Counts one entry field across a batch of decoded log entries. */
export function countEntryField(
	entries: Iterable<DecodedValue>,
	field: EntryField,
): Map<string, number> {
	return buildFrequencyMap(entries, ENTRY_FIELD_ACCESSORS[field]);
}
