export interface ReconnectionConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Consecutive failed attempts after which the circuit breaker opens. */
	readonly maxAttempts: number;
	/** Optional ± fraction applied to each delay; 0 keeps delays exact. */
	readonly jitterFactor?: number;
}

/** Snapshot of the reconnect bookkeeping. */
export interface ReconnectState {
	readonly consecutiveFailures: number;
	readonly currentBackoffMs: number;
	readonly maxBackoffMs: number;
}

/**
 * Exponential backoff reconnection policy with a circuit breaker.
 *
 * After `k` consecutive failures the next delay is `min(base × 2^k, max)`;
 * `reset()` after a clean connect brings it back to `base`.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private failures = 0;

	constructor(config: ReconnectionConfig) {
		this.config = config;
	}

	/** Delay the next wait would use, before jitter. */
	get currentBackoffMs(): number {
		return Math.min(this.config.baseDelayMs * 2 ** this.failures, this.config.maxDelayMs);
	}

	get consecutiveFailures(): number {
		return this.failures;
	}

	/** Returns the current backoff (with jitter, if configured) and counts one more attempt. */
	nextDelay(): number {
		const capped = this.currentBackoffMs;
		this.failures += 1;
		const jitterFactor = this.config.jitterFactor ?? 0;
		if (jitterFactor === 0) return capped;
		const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	reset(): void {
		this.failures = 0;
	}

	/** False once the circuit breaker has opened. */
	shouldRetry(): boolean {
		return this.failures < this.config.maxAttempts;
	}

	getState(): ReconnectState {
		return {
			consecutiveFailures: this.failures,
			currentBackoffMs: this.currentBackoffMs,
			maxBackoffMs: this.config.maxDelayMs,
		};
	}
}
