import { ConfigurationError, RateLimitError } from "../../shared/errors.js";
import { Mutex } from "../../shared/mutex.js";
import { sleep } from "../../shared/time.js";
import type { Clock } from "../../shared/time.js";

/**
 * Configuration for TokenBucketRateLimiter.
 */
export interface RateLimiterConfig {
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock: Clock;
	/** Suspension used while waiting for a refill; injectable so tests can drive a FakeClock. */
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

/** Snapshot of rate limiter usage statistics. */
export interface RateLimiterStats {
	readonly hits: number;
	readonly misses: number;
	readonly waits: number;
	readonly avgWaitMs: number;
}

/** Bucket state as exposed for diagnostics. */
export interface RateLimiterState {
	readonly capacity: number;
	readonly tokens: number;
	readonly lastRefillMs: number;
}

/**
 * Token-bucket rate limiter with injectable clock for deterministic testing.
 *
 * Tokens accumulate at `refillRate` tokens/second up to `capacity`, computed
 * lazily from elapsed time. `acquire()` suspends until a token is available;
 * concurrent callers are served in arrival order.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<boolean>;
	private readonly mutex = new Mutex();
	private tokens: number;
	private lastRefillMs: number;

	private _hits = 0;
	private _misses = 0;
	private _waits = 0;
	private _totalWaitMs = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigurationError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate <= 0) {
			throw new ConfigurationError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.sleepFn = config.sleep ?? sleep;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/**
	 * Waits until a token is available, then consumes it.
	 * @throws RateLimitError if `signal` aborts while waiting.
	 * @example
	 * await limiter.acquire();
	 * const res = await fetch(url);
	 */
	acquire(signal?: AbortSignal): Promise<void> {
		return this.mutex.runExclusive(async () => {
			if (this.rawTryAcquire()) {
				this._hits++;
				return;
			}
			const startMs = this.clock.now();
			this._waits++;
			while (!this.rawTryAcquire()) {
				const completed = await this.sleepFn(this.timeUntilNextTokenMs(), signal);
				if (!completed || signal?.aborted) {
					throw new RateLimitError("Aborted while waiting for a rate limit token", undefined, {
						waitedMs: this.clock.now() - startMs,
					});
				}
			}
			this._hits++;
			this._totalWaitMs += this.clock.now() - startMs;
		});
	}

	/**
	 * Attempts to acquire one token without blocking.
	 * @returns true if a token was acquired, false otherwise.
	 */
	tryAcquire(): boolean {
		if (this.mutex.isLocked) {
			this._misses++;
			return false;
		}
		const acquired = this.rawTryAcquire();
		if (acquired) {
			this._hits++;
		} else {
			this._misses++;
		}
		return acquired;
	}

	private rawTryAcquire(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	/**
	 * Returns the current number of available tokens (after refill).
	 * @returns Number of tokens available (floored to integer).
	 */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/**
	 * Returns the time in milliseconds until the next token becomes available.
	 * @returns 0 if tokens are available now, otherwise milliseconds to wait.
	 */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	getState(): RateLimiterState {
		this.refill();
		return { capacity: this.capacity, tokens: this.tokens, lastRefillMs: this.lastRefillMs };
	}

	/** Returns a snapshot of rate limiter usage statistics. */
	getStats(): RateLimiterStats {
		return {
			hits: this._hits,
			misses: this._misses,
			waits: this._waits,
			avgWaitMs: this._waits > 0 ? this._totalWaitMs / this._waits : 0,
		};
	}

	/** Resets all usage statistics counters to zero. */
	resetStats(): void {
		this._hits = 0;
		this._misses = 0;
		this._waits = 0;
		this._totalWaitMs = 0;
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs / 1000) * this.refillRate;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}
