/**
 * Auth bounded context — type definitions.
 *
 * Credentials are opaque branded types that prevent accidental logging
 * of secrets. ApiKeySet holds the raw material before sealing.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Domain types ─────────────────────────────────────────────────────

/**
 * Raw API key pair before sealing into opaque Credentials.
 */
export interface ApiKeySet {
	/** Public key sent as X-API-KEY and as the stream login `pKey`. */
	readonly apiKey: string;
	/** HMAC-SHA256 secret; never sent over the wire. */
	readonly apiSecret: string;
}

/**
 * Opaque credential container. toString, toJSON and Node's inspect all
 * return "[REDACTED]". Use createCredentials() / unwrapCredentials().
 */
export type Credentials = Brand<{ readonly __opaque: true }, "Credentials">;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * How the signed URL is formed.
 * - `absolute`: the full `https://host/path` URL is signed (venue default)
 * - `path`: only the request path is signed; opt-in for venues that expect it
 */
export type SigningMode = "absolute" | "path";

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Readonly<Record<string, QueryValue>>;

/** Request description handed to the signer. */
export interface SignInput {
	readonly method: HttpMethod;
	/** Absolute URL without query string (or a path under `signingMode: "path"`). */
	readonly url: string;
	readonly params?: QueryParams;
	/** JSON body; serialized compactly with sorted keys. */
	readonly body?: Readonly<Record<string, unknown>>;
}

/**
 * Fully signed request. `url` includes the serialized query and `body` is
 * the exact JSON text that was signed, so the transport must send both
 * unchanged.
 */
export interface SignedRequest {
	readonly method: HttpMethod;
	readonly url: string;
	readonly body: string | undefined;
	readonly nonce: number;
	readonly dataToSign: string;
	readonly signature: string;
	readonly headers: Readonly<Record<string, string>>;
}

/** Stream login frame. */
export interface LoginPayload {
	readonly method: "login";
	readonly params: {
		readonly algo: "HS256";
		readonly pKey: string;
		readonly nonce: string;
		readonly signature: string;
	};
}
