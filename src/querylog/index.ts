export {
	type DecodedValue,
	ABSENT,
	decode,
	fieldAt,
	stringAt,
	numberAt,
} from "./decoded-value.js";
export {
	type EntryField,
	ENTRY_FIELD_ACCESSORS,
	getHost,
	getReason,
	getClient,
	countEntryField,
} from "./entry-fields.js";
