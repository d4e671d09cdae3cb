/**
 * `key=value` request body parser.
 *
 * One parameter per line. Zero-length lines are skipped; every other line
 * must contain `=`, split at its first occurrence, with key and value
 * trimmed. A single bad line fails the whole body.
 */

import { MalformedInputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export type BodyParameters = Map<string, string>;

export function parseParameters(text: string): Result<BodyParameters, MalformedInputError> {
	const parameters: BodyParameters = new Map();
	const lines = text.split("\n");

	for (let i = 0; i < lines.length; i++) {
		const raw = lines[i] ?? "";
		const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
		if (line.length === 0) continue;

		const separator = line.indexOf("=");
		if (separator === -1) {
			return err(new MalformedInputError("Got invalid request body", { line: i + 1 }));
		}
		parameters.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
	}

	return ok(parameters);
}

/** Reads a whole body stream (e.g. an IncomingMessage) as UTF-8, then parses it. */
export async function parseParametersFromStream(
	stream: AsyncIterable<string | Uint8Array>,
): Promise<Result<BodyParameters, MalformedInputError>> {
	const decoder = new TextDecoder("utf-8");
	let text = "";
	for await (const chunk of stream) {
		if (typeof chunk === "string") {
			// Bytes held back for an incomplete sequence belong before this chunk.
			text += decoder.decode();
			text += chunk;
		} else {
			text += decoder.decode(chunk, { stream: true });
		}
	}
	text += decoder.decode();
	return parseParameters(text);
}
