/**
 * HTTP method guards for request handlers.
 *
 * A wrapped handler only runs when the request method matches; anything
 * else gets a plain-text 405. Typed structurally so Node's
 * `IncomingMessage`/`ServerResponse` and test doubles both fit.
 */

import type { Logger } from "../lib/logger/index.js";
import { MethodNotAllowedError, classifyError, httpStatusOf } from "../shared/errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RequestLike {
	readonly method?: string | undefined;
	readonly url?: string | undefined;
}

export interface ResponseLike {
	statusCode: number;
	readonly headersSent: boolean;
	setHeader(name: string, value: string): unknown;
	end(body: string): unknown;
}

export type Handler<Req extends RequestLike, Res extends ResponseLike> = (
	req: Req,
	res: Res,
) => void | Promise<void>;

export interface GuardOptions {
	readonly logger?: Logger;
}

/** Plain-text error response with sniffing disabled. */
export function writeError(res: ResponseLike, status: number, message: string): void {
	res.setHeader("Content-Type", "text/plain; charset=utf-8");
	res.setHeader("X-Content-Type-Options", "nosniff");
	res.statusCode = status;
	res.end(`${message}\n`);
}

/**
 * Only lets `method` through to `handler`.
 *
 * Errors thrown or rejected by the handler are logged and, if nothing has
 * been written yet, answered with the status their code maps to.
 */
export function ensureMethod<Req extends RequestLike, Res extends ResponseLike>(
	method: HttpMethod,
	handler: Handler<Req, Res>,
	options: GuardOptions = {},
): (req: Req, res: Res) => Promise<void> {
	const logger = options.logger;

	return async (req, res) => {
		if (req.method !== method) {
			const rejection = new MethodNotAllowedError(method, req.method);
			logger?.debug({ url: req.url, ...rejection.context }, "method not allowed");
			writeError(res, httpStatusOf(rejection), rejection.message);
			return;
		}

		try {
			await handler(req, res);
		} catch (e) {
			const error = classifyError(e);
			logger?.error({ url: req.url, error: error.toJSON() }, "handler failed");
			if (!res.headersSent) {
				writeError(res, httpStatusOf(error), error.message);
			}
		}
	};
}

export function ensureGET<Req extends RequestLike, Res extends ResponseLike>(
	handler: Handler<Req, Res>,
	options?: GuardOptions,
): (req: Req, res: Res) => Promise<void> {
	return ensureMethod("GET", handler, options);
}

export function ensurePOST<Req extends RequestLike, Res extends ResponseLike>(
	handler: Handler<Req, Res>,
	options?: GuardOptions,
): (req: Req, res: Res) => Promise<void> {
	return ensureMethod("POST", handler, options);
}

export function ensurePUT<Req extends RequestLike, Res extends ResponseLike>(
	handler: Handler<Req, Res>,
	options?: GuardOptions,
): (req: Req, res: Res) => Promise<void> {
	return ensureMethod("PUT", handler, options);
}

export function ensureDELETE<Req extends RequestLike, Res extends ResponseLike>(
	handler: Handler<Req, Res>,
	options?: GuardOptions,
): (req: Req, res: Res) => Promise<void> {
	return ensureMethod("DELETE", handler, options);
}
