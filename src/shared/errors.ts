/**
 * TradingError hierarchy — structured error classification for venue calls.
 *
 * Every error has a category (retryable, non-retryable, fatal) which drives
 * the REST retry loop, the engine's skip-this-cycle policy and the decision
 * to halt the instance.
 */

/** Error severity categories that drive retry and halt behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for all venue and engine operations, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Venue error types ────────────────────────────────────────────────

/** Fatal: credentials rejected (HTTP 401) or the request could not be signed. */
export class AuthenticationError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"AUTHENTICATION_ERROR",
			ErrorCategory.Fatal,
			rest,
			"Check API key/secret, trade permissions, IP whitelist and clock skew",
		);
		this.name = "AuthenticationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for HTTP 429 responses; carries the venue's retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number | undefined;
	constructor(message: string, retryAfterMs?: number, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** Retryable error for timeouts, connection resets, abrupt disconnects and 5xx responses. */
export class TransientApiError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TRANSIENT_API_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TransientApiError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/**
 * Non-retryable error for a malformed request: venue 4xx other than 401/429,
 * or a payload that failed schema validation.
 */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, context: ErrorContext = {}, issues: readonly ValidationIssue[] = []) {
		const { cause, ...rest } = context;
		super(message, "VALIDATION_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "ValidationError";
		this.issues = issues;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid configuration; the instance refuses to start. */
export class ConfigurationError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIGURATION_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigurationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable streaming failure (connect, login or send). */
export class StreamError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "STREAM_ERROR", ErrorCategory.Retryable, rest);
		this.name = "StreamError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: the streaming circuit breaker opened after too many consecutive failures. */
export class CircuitOpenError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CIRCUIT_OPEN", ErrorCategory.Fatal, rest);
		this.name = "CircuitOpenError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

const TRANSIENT_CODES = new Set([
	"ETIMEDOUT",
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EPIPE",
	"UND_ERR_SOCKET",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

function errorCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") return error.code;
	const cause = error.cause;
	if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
		return cause.code;
	}
	return undefined;
}

/**
 * Classify an unknown thrown value into the TradingError taxonomy.
 * Anything network-shaped (timeouts, resets, aborted fetches) is transient;
 * everything else unrecognised is treated as transient too so that one odd
 * failure skips a cycle instead of crashing the engine.
 */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const code = errorCode(error);
		if (error.name === "TimeoutError" || error.name === "AbortError") {
			return new TransientApiError(`Request timed out: ${error.message}`, { cause: error });
		}
		if (code !== undefined && TRANSIENT_CODES.has(code)) {
			return new TransientApiError(`Network error (${code}): ${error.message}`, {
				cause: error,
				errno: code,
			});
		}
		const msg = error.message.toLowerCase();
		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TransientApiError(error.message, { cause: error });
		}
		if (msg.includes("fetch failed") || msg.includes("socket hang up")) {
			return new TransientApiError(error.message, { cause: error });
		}
		return new TransientApiError(error.message, { cause: error, unclassified: true });
	}
	return new TransientApiError(String(error), { cause: error, unclassified: true });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for AuthenticationError. */
export function isAuthenticationError(e: unknown): e is AuthenticationError {
	return e instanceof AuthenticationError;
}

/** Type guard for RateLimitError. */
export function isRateLimitError(e: unknown): e is RateLimitError {
	return e instanceof RateLimitError;
}

/** Type guard for TransientApiError. */
export function isTransientApiError(e: unknown): e is TransientApiError {
	return e instanceof TransientApiError;
}

/** Type guard for ValidationError. */
export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

/** Type guard for ConfigurationError. */
export function isConfigurationError(e: unknown): e is ConfigurationError {
	return e instanceof ConfigurationError;
}
