import { ConfigurationError } from "../shared/errors.js";
import { MonotonicClock } from "../shared/time.js";
import type { Clock } from "../shared/time.js";

export interface NonceGeneratorConfig {
	/**
	 * Scale applied to the clock's millisecond reading. `1` yields
	 * millisecond nonces; `10` yields the 1e4-per-second format.
	 */
	readonly multiplier?: number;
	readonly clock?: Clock;
}

/**
 * Strictly increasing request nonces.
 *
 * `next()` is synchronous, so callers interleaving on the event loop can
 * never observe the same value. Every signed call path in a process must
 * share one instance.
 */
export class NonceGenerator {
	private readonly multiplier: number;
	private readonly clock: Clock;
	private last = 0;

	constructor(config: NonceGeneratorConfig = {}) {
		const multiplier = config.multiplier ?? 1;
		if (!Number.isFinite(multiplier) || multiplier <= 0) {
			throw new ConfigurationError("nonce multiplier must be a positive number", { multiplier });
		}
		this.multiplier = multiplier;
		this.clock = config.clock ?? MonotonicClock;
	}

	/** Returns `max(floor(now × multiplier), last + 1)`. */
	next(): number {
		const candidate = Math.floor(this.clock.now() * this.multiplier);
		const nonce = Math.max(candidate, this.last + 1);
		this.last = nonce;
		return nonce;
	}

	/** Last nonce handed out, or 0 before the first call. */
	get lastIssued(): number {
		return this.last;
	}
}
