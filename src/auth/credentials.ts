/**
 * Opaque credential container — secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { AuthenticationError } from "../shared/errors.js";
import type { ApiKeySet, Credentials } from "./types.js";

// ── Private store ────────────────────────────────────────────────────

const store = new WeakMap<object, ApiKeySet>();

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Seals an API key pair into opaque Credentials.
 *
 * @throws AuthenticationError if either half of the pair is blank
 * @example
 * const credentials = createCredentials({ apiKey: "key", apiSecret: "secret" });
 * logger.info({ credentials }, "loaded"); // credentials render as [REDACTED]
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	if (keys.apiKey.trim() === "" || keys.apiSecret.trim() === "") {
		throw new AuthenticationError("API key and secret must both be provided");
	}
	const obj: { __opaque: true; toString: () => string; toJSON: () => string } = Object.create(null);
	obj.__opaque = true as const;
	obj.toString = () => "[REDACTED]";
	obj.toJSON = () => "[REDACTED]";
	Object.defineProperty(obj, Symbol.for("nodejs.util.inspect.custom"), {
		value: () => "[REDACTED]",
	});
	store.set(obj, { apiKey: keys.apiKey, apiSecret: keys.apiSecret });
	return obj as unknown as Credentials;
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * Unwraps opaque credentials to retrieve the raw key pair.
 * @throws AuthenticationError if the object was not produced by createCredentials
 */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	const keys = store.get(credentials);
	if (!keys) {
		throw new AuthenticationError("Invalid credentials object");
	}
	return { ...keys };
}
