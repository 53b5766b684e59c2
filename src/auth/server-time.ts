/**
 * ServerTimeClock — local time shifted by the venue's clock offset.
 *
 * Hosts whose wall clock drifts get nonces the venue rejects. Feeding this
 * clock to the NonceGenerator aligns nonces with server time. The offset is
 * refreshed lazily once it is older than `maxAgeMs`; a failed refresh keeps
 * the last known offset.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { ValidationError, classifyError } from "../shared/errors.js";
import { MonotonicClock } from "../shared/time.js";
import type { Clock } from "../shared/time.js";

export interface ServerTimeConfig {
	/** Venue time in epoch milliseconds. */
	readonly fetchServerTime: () => Promise<number>;
	readonly maxAgeMs?: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

const DEFAULT_MAX_AGE_MS = 60_000;
const TIME_KEYS = ["serverTime", "server_time", "time", "timestamp"] as const;

/** Readings above this are milliseconds; below it, seconds. */
const MILLISECOND_THRESHOLD = 1e12;

export class ServerTimeClock implements Clock {
	private readonly fetchServerTime: () => Promise<number>;
	private readonly maxAgeMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private offsetMs = 0;
	private lastSyncMs: number | null = null;

	constructor(config: ServerTimeConfig) {
		this.fetchServerTime = config.fetchServerTime;
		this.maxAgeMs = config.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
		this.clock = config.clock ?? MonotonicClock;
		this.logger = config.logger ?? silentLogger();
	}

	now(): number {
		return this.clock.now() + this.offsetMs;
	}

	/** Server minus local time, in milliseconds. */
	get offset(): number {
		return this.offsetMs;
	}

	get isStale(): boolean {
		return this.lastSyncMs === null || this.clock.now() - this.lastSyncMs >= this.maxAgeMs;
	}

	async sync(): Promise<void> {
		const serverMs = await this.fetchServerTime();
		const localMs = this.clock.now();
		this.offsetMs = serverMs - localMs;
		this.lastSyncMs = localMs;
		this.logger.debug({ offsetMs: this.offsetMs }, "server time synced");
	}

	/**
	 * Syncs when the offset is stale. Non-fatal failures keep the previous offset.
	 * @returns true when a sync was attempted
	 */
	async syncIfStale(): Promise<boolean> {
		if (!this.isStale) return false;
		try {
			await this.sync();
		} catch (error) {
			const classified = classifyError(error);
			if (classified.isFatal) throw classified;
			this.logger.warn({ err: classified.message, offsetMs: this.offsetMs }, "server time sync failed");
		}
		return true;
	}
}

/**
 * Reads the venue's time from a `getservertime` payload: a bare number, or
 * one of the usual keys, possibly nested under `data` or `result`.
 * @returns epoch milliseconds
 * @throws ValidationError when no time can be read
 */
export function parseServerTime(payload: unknown): number {
	if (typeof payload === "object" && payload !== null && !Array.isArray(payload)) {
		const record = new Map(Object.entries(payload));
		for (const key of TIME_KEYS) {
			if (record.has(key)) return normalizeTime(record.get(key));
		}
		for (const key of ["data", "result"]) {
			if (record.has(key)) return parseServerTime(record.get(key));
		}
	}
	return normalizeTime(payload);
}

function normalizeTime(value: unknown): number {
	const parsed = Decimal.parse(typeof value === "string" ? value.trim() : value);
	if (parsed === null || !parsed.isPositive()) {
		throw new ValidationError("Unsupported server time payload", { payload: String(value) });
	}
	const numeric = parsed.toNumber();
	return numeric > MILLISECOND_THRESHOLD ? Math.floor(numeric) : Math.floor(numeric * 1_000);
}
