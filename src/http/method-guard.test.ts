import { describe, expect, it, vi } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { MalformedInputError } from "../shared/errors.js";
import {
	ensureDELETE,
	ensureGET,
	ensureMethod,
	ensurePOST,
	ensurePUT,
	writeError,
} from "./method-guard.js";
import type { RequestLike, ResponseLike } from "./method-guard.js";

class FakeResponse implements ResponseLike {
	statusCode = 200;
	headersSent = false;
	readonly headers = new Map<string, string>();
	body: string | undefined;

	setHeader(name: string, value: string): this {
		this.headers.set(name, value);
		return this;
	}

	end(body: string): this {
		this.body = body;
		this.headersSent = true;
		return this;
	}
}

function request(method: string | undefined, url = "/control/stats"): RequestLike {
	return { method, url };
}

describe("writeError", () => {
	it("writes a plain-text body with a trailing newline", () => {
		const res = new FakeResponse();
		writeError(res, 400, "bad");

		expect(res.statusCode).toBe(400);
		expect(res.body).toBe("bad\n");
		expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
		expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
	});
});

describe("ensureMethod", () => {
	it("invokes the handler for the matching method", async () => {
		const handler = vi.fn((_req: RequestLike, res: FakeResponse) => {
			res.end("ok");
		});
		const res = new FakeResponse();

		await ensureMethod("GET", handler)(request("GET"), res);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(res.statusCode).toBe(200);
		expect(res.body).toBe("ok");
	});

	it("answers 405 without invoking the handler", async () => {
		const handler = vi.fn();
		const res = new FakeResponse();

		await ensureMethod("POST", handler)(request("GET"), res);

		expect(handler).not.toHaveBeenCalled();
		expect(res.statusCode).toBe(405);
		expect(res.body).toBe("This request must be POST\n");
	});

	it("rejects a request without a method", async () => {
		const res = new FakeResponse();
		await ensureMethod("PUT", vi.fn())(request(undefined), res);
		expect(res.statusCode).toBe(405);
	});

	it("matches methods case-sensitively", async () => {
		const res = new FakeResponse();
		await ensureMethod("GET", vi.fn())(request("get"), res);
		expect(res.statusCode).toBe(405);
	});

	it("maps handler errors to their HTTP status", async () => {
		const res = new FakeResponse();
		const handler = async (): Promise<void> => {
			throw new MalformedInputError("Got invalid request body");
		};

		await ensureMethod("POST", handler)(request("POST"), res);

		expect(res.statusCode).toBe(400);
		expect(res.body).toBe("Got invalid request body\n");
	});

	it("answers 500 for unexpected errors", async () => {
		const res = new FakeResponse();
		await ensureMethod("GET", () => {
			throw new Error("store unavailable");
		})(request("GET"), res);

		expect(res.statusCode).toBe(500);
		expect(res.body).toBe("store unavailable\n");
	});

	it("does not write twice when the handler already responded", async () => {
		const res = new FakeResponse();
		await ensureMethod("GET", (_req: RequestLike, r: FakeResponse) => {
			r.end("partial");
			throw new Error("late failure");
		})(request("GET"), res);

		expect(res.statusCode).toBe(200);
		expect(res.body).toBe("partial");
	});

	it("logs rejections and failures", async () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "debug", destination: { write: (m) => lines.push(m) } });

		await ensureMethod("DELETE", vi.fn(), { logger })(request("GET"), new FakeResponse());
		await ensureMethod("GET", () => {
			throw new Error("boom");
		}, { logger })(request("GET"), new FakeResponse());

		const messages = lines.map((l) => (JSON.parse(l) as { msg: string }).msg);
		expect(messages).toEqual(["method not allowed", "handler failed"]);
	});
});

describe("method shorthands", () => {
	it.each([
		["GET", ensureGET],
		["POST", ensurePOST],
		["PUT", ensurePUT],
		["DELETE", ensureDELETE],
	] as const)("%s only admits its own method", async (method, guard) => {
		const handler = vi.fn();
		const allowed = new FakeResponse();
		const rejected = new FakeResponse();

		await guard(handler)(request(method), allowed);
		await guard(handler)(request(method === "GET" ? "POST" : "GET"), rejected);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(rejected.statusCode).toBe(405);
		expect(rejected.body).toBe(`This request must be ${method}\n`);
	});
});
