export { type BodyParameters, parseParameters, parseParametersFromStream } from "./body-parser.js";
export {
	type HttpMethod,
	type RequestLike,
	type ResponseLike,
	type Handler,
	type GuardOptions,
	writeError,
	ensureMethod,
	ensureGET,
	ensurePOST,
	ensurePUT,
	ensureDELETE,
} from "./method-guard.js";
