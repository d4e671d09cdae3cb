import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { MalformedInputError } from "../shared/errors.js";
import { parseParameters, parseParametersFromStream } from "./body-parser.js";

describe("parseParameters", () => {
	it("splits lines on the first separator and trims both sides", () => {
		const result = parseParameters("  upstream_dns = 8.8.8.8 \nfilter=a=b\n");
		expect(result).toEqual({
			ok: true,
			value: new Map([
				["upstream_dns", "8.8.8.8"],
				["filter", "a=b"],
			]),
		});
	});

	it("skips blank lines", () => {
		const result = parseParameters("\n\nname=list\n\n\nurl=https://example.org/list.txt\n");
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect([...result.value.keys()]).toEqual(["name", "url"]);
		}
	});

	it("accepts CRLF line endings", () => {
		const result = parseParameters("a=1\r\n\r\nb=2\r\n");
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.get("a")).toBe("1");
			expect(result.value.get("b")).toBe("2");
		}
	});

	it("keeps empty keys and values", () => {
		const result = parseParameters("=\nkey=");
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.get("")).toBe("");
			expect(result.value.get("key")).toBe("");
		}
	});

	it("lets later lines overwrite earlier keys", () => {
		const result = parseParameters("k=1\nk=2");
		expect(result.ok && result.value.get("k")).toBe("2");
	});

	it("returns an empty map for an empty body", () => {
		expect(parseParameters("")).toEqual({ ok: true, value: new Map() });
	});

	it("fails on a line without a separator and drops partial results", () => {
		const result = parseParameters("a=1\nb=2\njunk\nc=3");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(MalformedInputError);
			expect(result.error.message).toBe("Got invalid request body");
			expect(result.error.context).toEqual({ line: 3 });
		}
	});

	it("treats whitespace-only lines as malformed", () => {
		const result = parseParameters("a=1\n   \n");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.context).toEqual({ line: 2 });
		}
	});
});

describe("parseParametersFromStream", () => {
	it("parses a chunked byte stream", async () => {
		const bytes = new TextEncoder().encode("name=café\nenabled=true\n");
		const stream = Readable.from([bytes.slice(0, 8), bytes.slice(8)]);

		const result = await parseParametersFromStream(stream);

		expect(result).toEqual({
			ok: true,
			value: new Map([
				["name", "café"],
				["enabled", "true"],
			]),
		});
	});

	it("accepts string chunks", async () => {
		async function* chunks(): AsyncGenerator<string> {
			yield "a=";
			yield "1\nb";
			yield "=2";
		}
		const result = await parseParametersFromStream(chunks());
		expect(result.ok && [...result.value.entries()]).toEqual([
			["a", "1"],
			["b", "2"],
		]);
	});

	it("keeps text in arrival order when string and byte chunks mix", async () => {
		async function* chunks(): AsyncGenerator<string | Uint8Array> {
			yield Uint8Array.from([0x61, 0x3d, 0xc3, 0xa9]);
			yield "x\nb=";
			yield Uint8Array.from([0x79]);
		}
		const result = await parseParametersFromStream(chunks());
		expect(result.ok && [...result.value.entries()]).toEqual([
			["a", "\u00e9x"],
			["b", "y"],
		]);
	});

	it("does not carry a truncated byte sequence past a string chunk", async () => {
		async function* chunks(): AsyncGenerator<string | Uint8Array> {
			yield Uint8Array.from([0x61, 0x3d, 0xc3]);
			yield "x";
			yield Uint8Array.from([0xa9]);
		}
		const result = await parseParametersFromStream(chunks());
		expect(result.ok && result.value.get("a")).toBe("\ufffdx\ufffd");
	});

	it("propagates malformed lines", async () => {
		const result = await parseParametersFromStream(Readable.from(["ok=1\nbroken\n"]));
		expect(result.ok).toBe(false);
	});
});
