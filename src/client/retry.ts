/**
 * Retry loop for REST calls — exponential backoff with jitter.
 *
 * Only retryable errors (transient and rate-limit) are retried; everything
 * else short-circuits on the first failure. A rate limit with a Retry-After
 * hint waits exactly that long.
 */

import type { Logger } from "../lib/logger/index.js";
import { RateLimitError, TradingError, classifyError } from "../shared/errors.js";
import { sleep as defaultSleep } from "../shared/time.js";

export interface RetryOptions {
	/** Retries after the first attempt. */
	readonly maxRetries: number;
	readonly backoffFactorMs: number;
	readonly logger: Logger;
	readonly signal?: AbortSignal;
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
	/** Uniform [0, 1) source for jitter. */
	readonly random?: () => number;
}

/**
 * Backoff before retry number `attempt` (1-based):
 * `base = factor × 2^(attempt−1)`, plus uniform jitter in `[0, base)`.
 */
export function computeBackoffMs(attempt: number, backoffFactorMs: number, random: () => number = Math.random): number {
	const base = backoffFactorMs * 2 ** (attempt - 1);
	return base + random() * base;
}

/** @internal Exported for testing only. */
export function retryDelayMs(
	attempt: number,
	error: TradingError,
	backoffFactorMs: number,
	random: () => number = Math.random,
): number {
	if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
		return error.retryAfterMs;
	}
	return computeBackoffMs(attempt, backoffFactorMs, random);
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `maxRetries` retries have been spent. The last error is rethrown as a
 * TradingError.
 *
 * @example
 * ```ts
 * const body = await withRetry((attempt) => sendOnce(request, attempt), {
 *   maxRetries: 3,
 *   backoffFactorMs: 500,
 *   logger,
 * });
 * ```
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const sleep = options.sleep ?? defaultSleep;
	const random = options.random ?? Math.random;
	let attempt = 0;
	for (;;) {
		try {
			return await operation(attempt);
		} catch (thrown) {
			const error = thrown instanceof TradingError ? thrown : classifyError(thrown);
			attempt++;
			if (!error.isRetryable || attempt > options.maxRetries) {
				throw error;
			}
			const delay = retryDelayMs(attempt, error, options.backoffFactorMs, random);
			options.logger.warn(
				{ attempt, maxRetries: options.maxRetries, delayMs: Math.round(delay), code: error.code },
				`Retrying after ${error.name}: ${error.message}`,
			);
			const completed = await sleep(delay, options.signal);
			if (!completed) {
				throw error;
			}
		}
	}
}
