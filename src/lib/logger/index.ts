/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Opaque credential objects (anything with `__opaque: true`) are always
 * rendered as "[REDACTED]", and API key/secret/signature fields are censored
 * by default. Request-scoped context travels through `child()` loggers that
 * the caller creates per request, never through shared mutable state.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Extra pino redact paths, merged with the default sensitive keys. */
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Static bindings added to every line (e.g. `{ component: "ladder" }`). */
	readonly base?: Record<string, unknown>;
}

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Field names censored wherever they appear at the top level or one level down. */
export const SENSITIVE_LOG_KEYS = [
	"apiKey",
	"apiSecret",
	"api_key",
	"api_secret",
	"secret",
	"signature",
	"password",
] as const;

const DEFAULT_REDACT_PATHS = SENSITIVE_LOG_KEYS.flatMap((key) => [key, `*.${key}`]);

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactCredentials(obj: object): Record<string, unknown> {
	if (isOpaqueCredential(obj)) return { credentials: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const emit =
		(level: PinoMethod) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "object" && msgOrObj !== null) {
				pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj ?? ""));
			}
		};
	return {
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
		debug: emit("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactCredentials(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with credential redaction and an optional
 * custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ symbol: "BTC_USDT" }).info({ price: "90000" }, "Placed buy");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
		...(config.base !== undefined && { base: config.base }),
	};

	if (config.destination) {
		const sink = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				sink.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

const noop = (): void => {};

/** A Logger that discards everything; the default for library components. */
export function silentLogger(): Logger {
	const logger: Logger = {
		info: noop,
		warn: noop,
		error: noop,
		debug: noop,
		child: () => logger,
	};
	return logger;
}
