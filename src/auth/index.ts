export type {
	ApiKeySet,
	Credentials,
	HttpMethod,
	LoginPayload,
	QueryParams,
	QueryValue,
	SignInput,
	SignedRequest,
	SigningMode,
} from "./types.js";
export { createCredentials, unwrapCredentials } from "./credentials.js";
export { NonceGenerator } from "./nonce.js";
export type { NonceGeneratorConfig } from "./nonce.js";
export { ServerTimeClock, parseServerTime } from "./server-time.js";
export type { ServerTimeConfig } from "./server-time.js";
export {
	RequestSigner,
	buildLoginPayload,
	compactSortedJson,
	hmacSha256Hex,
	randomLoginNonce,
	serializeQuery,
	signRequest,
} from "./signer.js";
export type { RequestSignerConfig } from "./signer.js";
