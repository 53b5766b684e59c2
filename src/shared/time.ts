/**
 * Time utilities — injectable clocks and an abortable sleep.
 *
 * Components take a Clock instead of calling Date.now() so that nonces,
 * token refills, cache ages and backoff can be driven from tests.
 */

import { performance } from "node:perf_hooks";

/** Injectable time source in epoch milliseconds. */
export interface Clock {
	now(): number;
}

/** Wall clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/**
 * Monotonic clock anchored at process start: epoch-scaled, but never steps
 * backwards when the wall clock is adjusted. Nonces are derived from it.
 */
export const MonotonicClock: Clock = {
	now: () => performance.timeOrigin + performance.now(),
};

/** Controllable clock for deterministic tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Sleep ────────────────────────────────────────────────────────────

/**
 * Resolves after `ms`, or early (without rejecting) when `signal` aborts.
 * Returns true when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) return Promise.resolve(false);
	if (ms <= 0) return Promise.resolve(true);
	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
} as const;
