/**
 * Maps a failed HTTP response onto the TradingError taxonomy.
 *
 * - 401: AuthenticationError carrying operator guidance and the endpoint
 * - 429: RateLimitError with the Retry-After hint
 * - 500/502/503/504: TransientApiError
 * - any other status: ValidationError, with min-notional and
 *   insufficient-funds rejections recognised
 */

import {
	AuthenticationError,
	RateLimitError,
	TransientApiError,
	ValidationError,
} from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { isRecord } from "./parse.js";

export const MIN_NOTIONAL_MESSAGE = "Minimum order notional requirement not met.";

const TRANSIENT_STATUSES = new Set([500, 502, 503, 504]);
const MIN_NOTIONAL_CODES = new Set(["min_notional", "min_notional_not_met"]);
const ERROR_CODE_KEYS = ["code", "error_code", "errorCode"] as const;
const ERROR_MESSAGE_KEYS = ["message", "error", "detail", "details"] as const;

const UNAUTHORIZED_GUIDANCE =
	"HTTP error 401: Not Authorized. Verify the API key and secret, make sure the key has trading " +
	"permission, confirm the IP whitelist includes this machine's egress address, and check for clock skew.";

/** Parses a Retry-After header given in seconds; undefined when absent or malformed. */
export function parseRetryAfterMs(header: string | null): number | undefined {
	if (header === null || header.trim() === "") return undefined;
	const seconds = Number(header);
	if (!Number.isFinite(seconds) || seconds < 0) return undefined;
	return Math.round(seconds * 1000);
}

function parseJson(text: string): unknown {
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return undefined;
	}
}

function extractErrorCode(payload: unknown): string | undefined {
	if (!isRecord(payload)) return undefined;
	for (const key of ERROR_CODE_KEYS) {
		if (key in payload) return String(payload[key]);
	}
	for (const outer of ["error", "errors"] as const) {
		const nested = payload[outer];
		if (isRecord(nested)) {
			for (const key of ERROR_CODE_KEYS) {
				if (key in nested) return String(nested[key]);
			}
		}
	}
	return undefined;
}

function extractErrorMessage(payload: unknown): string | undefined {
	if (!isRecord(payload)) return undefined;
	for (const key of ERROR_MESSAGE_KEYS) {
		const value = payload[key];
		if (typeof value === "string") return value;
		if (isRecord(value) && typeof value["message"] === "string") return value["message"];
	}
	return undefined;
}

function mentionsMinNotional(message: string): boolean {
	const lowered = message.toLowerCase();
	if (["notional", "minimum", "amount"].some((k) => lowered.includes(k))) return true;
	return /\bmin\b/.test(lowered);
}

/** Returns the min-notional message when the rejection payload describes one. */
export function detectMinNotional(payloadText: string): string | undefined {
	if (payloadText === "") return undefined;
	const payload = parseJson(payloadText);
	if (payload !== undefined) {
		const code = extractErrorCode(payload);
		if (code !== undefined && MIN_NOTIONAL_CODES.has(code.toLowerCase())) {
			return MIN_NOTIONAL_MESSAGE;
		}
		const message = extractErrorMessage(payload);
		if (message !== undefined && mentionsMinNotional(message)) {
			return MIN_NOTIONAL_MESSAGE;
		}
	}
	return mentionsMinNotional(payloadText) ? MIN_NOTIONAL_MESSAGE : undefined;
}

export interface HttpFailure {
	readonly status: number;
	readonly payloadText: string;
	readonly retryAfter: string | null;
	/** Request path, reported to the operator. */
	readonly endpoint: string;
}

export function classifyHttpFailure(failure: HttpFailure): TradingError {
	const { status, payloadText, endpoint } = failure;
	const context = { status, endpoint };

	if (status === 401) {
		const detail = payloadText !== "" ? ` Response payload: ${payloadText}` : "";
		return new AuthenticationError(`${UNAUTHORIZED_GUIDANCE} Endpoint: ${endpoint}${detail}`, context);
	}
	if (status === 429) {
		return new RateLimitError("Rate limit exceeded", parseRetryAfterMs(failure.retryAfter), context);
	}
	if (TRANSIENT_STATUSES.has(status)) {
		return new TransientApiError(`Transient HTTP error ${status}`, context);
	}

	const minNotional = detectMinNotional(payloadText);
	if (minNotional !== undefined) {
		return new ValidationError(`HTTP error ${status}: ${minNotional} Response payload: ${payloadText}`, {
			...context,
			minNotional: true,
		});
	}
	const insufficientFunds = /insufficient (funds|balance)/i.test(payloadText);
	const message = payloadText !== "" ? `HTTP error ${status}: ${payloadText}` : `HTTP error ${status}`;
	return new ValidationError(message, insufficientFunds ? { ...context, insufficientFunds } : context);
}
