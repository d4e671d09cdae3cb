/**
 * Decoded query-log values.
 *
 * Log entries arrive as loosely typed JSON. `decode` lifts them into a
 * tagged union once, and the accessors below walk it without ever
 * throwing: any shape mismatch reads as `absent`.
 */

export type DecodedValue =
	| { readonly kind: "string"; readonly value: string }
	| { readonly kind: "number"; readonly value: number }
	| { readonly kind: "object"; readonly fields: ReadonlyMap<string, DecodedValue> }
	| { readonly kind: "absent" };

export const ABSENT: DecodedValue = { kind: "absent" };

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
	if (typeof raw !== "object" || raw === null) return false;
	const proto: unknown = Object.getPrototypeOf(raw);
	return proto === Object.prototype || proto === null;
}

/**
 * Lifts an arbitrary value (usually `JSON.parse` output) into the model.
 * Nulls, booleans, arrays, class instances such as `Date` or `Map`, and
 * non-finite numbers become `absent`. A field that refers back to one of
 * its enclosing objects is `absent` too.
 */
export function decode(raw: unknown): DecodedValue {
	return decodeWithin(raw, new WeakSet<object>());
}

function decodeWithin(raw: unknown, enclosing: WeakSet<object>): DecodedValue {
	if (typeof raw === "string") return { kind: "string", value: raw };
	if (typeof raw === "number") return Number.isFinite(raw) ? { kind: "number", value: raw } : ABSENT;
	if (!isPlainObject(raw) || enclosing.has(raw)) return ABSENT;

	enclosing.add(raw);
	const fields = new Map<string, DecodedValue>();
	for (const [key, value] of Object.entries(raw)) {
		fields.set(key, decodeWithin(value, enclosing));
	}
	enclosing.delete(raw);
	return { kind: "object", fields };
}

/** Follows `path` through nested objects. */
export function fieldAt(value: DecodedValue, ...path: readonly string[]): DecodedValue {
	let current = value;
	for (const key of path) {
		if (current.kind !== "object") return ABSENT;
		current = current.fields.get(key) ?? ABSENT;
	}
	return current;
}

export function stringAt(value: DecodedValue, ...path: readonly string[]): string | undefined {
	const found = fieldAt(value, ...path);
	return found.kind === "string" ? found.value : undefined;
}

export function numberAt(value: DecodedValue, ...path: readonly string[]): number | undefined {
	const found = fieldAt(value, ...path);
	return found.kind === "number" ? found.value : undefined;
}
