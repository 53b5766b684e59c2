/**
 * Config loading: environment overrides merged over a raw object, then
 * validated into a BotConfig. Credentials never travel through here.
 */

import { validate } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { ConfigurationError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { BotConfigSchema } from "./schema.js";
import type { BotConfig } from "./schema.js";

type Section = "api" | "stream" | "ladder" | "runner";

/** Per-section raw overrides, applied over the caller's raw config. */
export interface ConfigOverrides {
	api?: Record<string, unknown>;
	stream?: Record<string, unknown>;
	ladder?: Record<string, unknown>;
	runner?: Record<string, unknown>;
	logLevel?: string;
}

type Env = Readonly<Record<string, string | undefined>>;

const SECTIONS: readonly Section[] = ["api", "stream", "ladder", "runner"];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates `raw` (after applying `overrides`) into a BotConfig.
 *
 * @example
 * ```ts
 * const result = loadConfig(JSON.parse(text), configFromEnv());
 * if (!result.ok) throw result.error;
 * ```
 */
export function loadConfig(raw: unknown, overrides: ConfigOverrides = {}): Result<BotConfig, ValidationError> {
	return validate(BotConfigSchema, applyOverrides(raw, overrides), "Config");
}

function applyOverrides(raw: unknown, overrides: ConfigOverrides): unknown {
	if (!isRecord(raw)) return raw;
	const merged: Record<string, unknown> = { ...raw };
	for (const section of SECTIONS) {
		const extra = overrides[section];
		if (extra === undefined || Object.keys(extra).length === 0) continue;
		const current = raw[section];
		merged[section] = { ...(isRecord(current) ? current : {}), ...extra };
	}
	if (overrides.logLevel !== undefined) merged["logLevel"] = overrides.logLevel;
	return merged;
}

/**
 * Reads non-secret overrides from `LADDER_*` variables.
 * Supported: LADDER_SYMBOL, LADDER_MODE, LADDER_POLL_INTERVAL_MS,
 * LADDER_BASE_URL, LADDER_WS_URL, LADDER_LOG_LEVEL, LADDER_NONCE_MULTIPLIER,
 * LADDER_STATE_PATH, LADDER_USE_SERVER_TIME ("1" enables).
 * @throws ConfigurationError if a numeric variable holds an invalid value
 */
export function configFromEnv(env: Env = process.env): ConfigOverrides {
	const api: Record<string, unknown> = {};
	const ladder: Record<string, unknown> = {};
	const runner: Record<string, unknown> = {};
	const result: ConfigOverrides = { api, ladder, runner };

	setString(env, "LADDER_SYMBOL", ladder, "symbol");
	setString(env, "LADDER_MODE", ladder, "mode");
	setString(env, "LADDER_BASE_URL", api, "baseUrl");
	setString(env, "LADDER_WS_URL", api, "wsUrl");
	setString(env, "LADDER_STATE_PATH", runner, "statePath");

	const pollInterval = parsePositiveInt(env, "LADDER_POLL_INTERVAL_MS");
	if (pollInterval !== undefined) runner["pollIntervalMs"] = pollInterval;
	const multiplier = parsePositiveNumber(env, "LADDER_NONCE_MULTIPLIER");
	if (multiplier !== undefined) api["nonceMultiplier"] = multiplier;
	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const serverTime = env["LADDER_USE_SERVER_TIME"];
	if (serverTime) api["useServerTime"] = serverTime.trim() === "1";

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const logLevel = env["LADDER_LOG_LEVEL"];
	if (logLevel) result.logLevel = logLevel;

	return result;
}

function setString(env: Env, envKey: string, target: Record<string, unknown>, key: string): void {
	const raw = env[envKey];
	if (raw) target[key] = raw.trim();
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveInt(env: Env, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigurationError(`Invalid ${envKey}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

function parsePositiveNumber(env: Env, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = Number(raw.trim());
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new ConfigurationError(`Invalid ${envKey}: "${raw}" must be a positive number`);
	}
	return parsed;
}
