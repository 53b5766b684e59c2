/**
 * Request signing — HMAC-SHA256 over `apiKey + dataToSign + nonce`.
 *
 * - GET: `dataToSign` is the URL, plus `?` and the key-sorted urlencoded
 *   query when parameters are present.
 * - Other methods: the URL followed by the compact, key-sorted JSON body.
 */

import { createHmac, randomInt } from "node:crypto";
import { AuthenticationError } from "../shared/errors.js";
import { unwrapCredentials } from "./credentials.js";
import type { NonceGenerator } from "./nonce.js";
import type {
	Credentials,
	LoginPayload,
	QueryParams,
	SignInput,
	SignedRequest,
	SigningMode,
} from "./types.js";

const ABSOLUTE_URL_RE = /^https?:\/\/[^/?#]+/i;
const NONCE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const LOGIN_NONCE_LENGTH = 14;

// ── Serialization ────────────────────────────────────────────────────

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
	if (a < b) return -1;
	return a > b ? 1 : 0;
}

/** Urlencodes params sorted by key, omitting undefined values. */
export function serializeQuery(params: QueryParams | undefined): string {
	if (params === undefined) return "";
	const search = new URLSearchParams();
	const entries = Object.entries(params).sort(byKey);
	for (const [key, value] of entries) {
		if (value !== undefined) search.append(key, String(value));
	}
	return search.toString();
}

function sortKeysDeep(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(sortKeysDeep);
	if (value !== null && typeof value === "object") {
		const sorted: Record<string, unknown> = {};
		for (const [key, inner] of Object.entries(value).sort(byKey)) {
			sorted[key] = sortKeysDeep(inner);
		}
		return sorted;
	}
	return value;
}

/** JSON with no whitespace and object keys sorted at every depth. */
export function compactSortedJson(body: unknown): string {
	return JSON.stringify(sortKeysDeep(body));
}

export function hmacSha256Hex(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message, "utf8").digest("hex");
}

// ── Signing ──────────────────────────────────────────────────────────

/**
 * Signs one request with an explicit nonce. Pure apart from the HMAC.
 *
 * @throws AuthenticationError when `url` is not absolute in `absolute` mode
 * @example
 * const signed = signRequest(
 *   { method: "GET", url: "https://api.nonkyc.io/api/v2/balances" },
 *   credentials,
 *   nonces.next(),
 * );
 * await fetch(signed.url, { headers: signed.headers });
 */
export function signRequest(
	input: SignInput,
	credentials: Credentials,
	nonce: number,
	signingMode: SigningMode = "absolute",
): SignedRequest {
	if (signingMode === "absolute" && !ABSOLUTE_URL_RE.test(input.url)) {
		throw new AuthenticationError("Refusing to sign a relative URL; pass the absolute endpoint URL", {
			url: input.url,
		});
	}
	if (signingMode === "path" && !input.url.startsWith("/")) {
		throw new AuthenticationError("Path signing requires a URL path starting with /", { url: input.url });
	}
	const { apiKey, apiSecret } = unwrapCredentials(credentials);

	let dataToSign = input.url;
	let url = input.url;
	let body: string | undefined;
	if (input.method === "GET") {
		const query = serializeQuery(input.params);
		if (query !== "") {
			dataToSign = `${input.url}?${query}`;
			url = dataToSign;
		}
	} else if (input.body !== undefined) {
		body = compactSortedJson(input.body);
		dataToSign = `${input.url}${body}`;
	}

	const signature = hmacSha256Hex(apiSecret, `${apiKey}${dataToSign}${nonce}`);
	return {
		method: input.method,
		url,
		body,
		nonce,
		dataToSign,
		signature,
		headers: {
			"X-API-KEY": apiKey,
			"X-API-NONCE": String(nonce),
			"X-API-SIGN": signature,
		},
	};
}

/** Random alphanumeric token used as the stream login nonce. */
export function randomLoginNonce(length = LOGIN_NONCE_LENGTH): string {
	let token = "";
	for (let i = 0; i < length; i++) {
		token += NONCE_ALPHABET.charAt(randomInt(NONCE_ALPHABET.length));
	}
	return token;
}

/**
 * Builds the stream login frame: the signature is HMAC(secret, nonce).
 * @param nonce - Fixed token for tests; a random 14-character one otherwise
 */
export function buildLoginPayload(credentials: Credentials, nonce?: string): LoginPayload {
	const { apiKey, apiSecret } = unwrapCredentials(credentials);
	const token = nonce ?? randomLoginNonce();
	return {
		method: "login",
		params: {
			algo: "HS256",
			pKey: apiKey,
			nonce: token,
			signature: hmacSha256Hex(apiSecret, token),
		},
	};
}

// ── Stateful signer ──────────────────────────────────────────────────

export interface RequestSignerConfig {
	readonly credentials: Credentials;
	readonly nonces: NonceGenerator;
	readonly signingMode?: SigningMode;
}

/**
 * Binds credentials to the process-wide nonce generator. Each `sign()` call
 * draws a fresh nonce, so a retried request is re-signed rather than replayed.
 */
export class RequestSigner {
	private readonly credentials: Credentials;
	private readonly nonces: NonceGenerator;
	readonly signingMode: SigningMode;

	constructor(config: RequestSignerConfig) {
		this.credentials = config.credentials;
		this.nonces = config.nonces;
		this.signingMode = config.signingMode ?? "absolute";
	}

	sign(input: SignInput): SignedRequest {
		return signRequest(input, this.credentials, this.nonces.next(), this.signingMode);
	}

	loginPayload(nonce?: string): LoginPayload {
		return buildLoginPayload(this.credentials, nonce);
	}
}
