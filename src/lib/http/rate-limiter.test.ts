import { describe, expect, it } from "vitest";
import { ConfigurationError, RateLimitError } from "../../shared/errors.js";
import { FakeClock } from "../../shared/time.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

describe("TokenBucketRateLimiter", () => {
	function createLimiter(capacity = 5, refillRate = 1) {
		const clock = new FakeClock(1000);
		const sleeps: number[] = [];
		const limiter = new TokenBucketRateLimiter({
			capacity,
			refillRate,
			clock,
			sleep: async (ms, signal) => {
				if (signal?.aborted) return false;
				sleeps.push(ms);
				clock.advance(ms);
				return true;
			},
		});
		return { limiter, clock, sleeps };
	}

	it("starts with full capacity", () => {
		const { limiter } = createLimiter(5);
		expect(limiter.availableTokens()).toBe(5);
	});

	it("tryAcquire decrements tokens", () => {
		const { limiter } = createLimiter(5);
		limiter.tryAcquire();
		limiter.tryAcquire();
		limiter.tryAcquire();
		expect(limiter.availableTokens()).toBe(2);
	});

	it("tryAcquire returns false when exhausted", () => {
		const { limiter } = createLimiter(3);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(false);
	});

	it("tokens refill over time", () => {
		const { limiter, clock } = createLimiter(5, 2);
		for (let i = 0; i < 5; i++) limiter.tryAcquire();
		expect(limiter.availableTokens()).toBe(0);

		// 2 seconds at 2 tokens/sec
		clock.advance(2000);
		expect(limiter.availableTokens()).toBe(4);
	});

	it("refill does not exceed capacity", () => {
		const { limiter, clock } = createLimiter(5, 10);
		for (let i = 0; i < 5; i++) limiter.tryAcquire();
		clock.advance(10_000);
		expect(limiter.availableTokens()).toBe(5);
	});

	it("partial refill floors to integer", () => {
		const { limiter, clock } = createLimiter(5, 1);
		for (let i = 0; i < 5; i++) limiter.tryAcquire();
		clock.advance(2500);
		expect(limiter.availableTokens()).toBe(2);
	});

	it("rejects capacity < 1 and non-positive refillRate", () => {
		const clock = new FakeClock(1000);
		expect(() => new TokenBucketRateLimiter({ capacity: 0, refillRate: 1, clock })).toThrow(
			"capacity must be >= 1",
		);
		expect(() => new TokenBucketRateLimiter({ capacity: 5, refillRate: 0, clock })).toThrow(
			ConfigurationError,
		);
	});

	describe("timeUntilNextTokenMs", () => {
		it("returns 0 when tokens are available", () => {
			const { limiter } = createLimiter(5, 1);
			expect(limiter.timeUntilNextTokenMs()).toBe(0);
		});

		it("returns the refill time when exhausted", () => {
			const { limiter, clock } = createLimiter(1, 2);
			limiter.tryAcquire();
			expect(limiter.timeUntilNextTokenMs()).toBe(500);
			clock.advance(200);
			expect(limiter.timeUntilNextTokenMs()).toBe(300);
		});
	});

	describe("acquire", () => {
		it("resolves immediately when a token is available", async () => {
			const { limiter, sleeps } = createLimiter(5);
			await limiter.acquire();
			expect(limiter.availableTokens()).toBe(4);
			expect(sleeps).toEqual([]);
		});

		it("suspends until the bucket refills", async () => {
			const { limiter, clock, sleeps } = createLimiter(1, 1);
			await limiter.acquire();
			await limiter.acquire();
			expect(sleeps).toEqual([1000]);
			expect(clock.now()).toBe(2000);
			expect(limiter.getStats()).toEqual({ hits: 2, misses: 0, waits: 1, avgWaitMs: 1000 });
		});

		it("serves concurrent callers in arrival order", async () => {
			const { limiter, clock } = createLimiter(1, 1);
			const order: number[] = [];
			await Promise.all(
				[1, 2, 3].map((n) =>
					limiter.acquire().then(() => {
						order.push(n);
					}),
				),
			);
			expect(order).toEqual([1, 2, 3]);
			expect(clock.now()).toBe(3000);
		});

		it("rejects with RateLimitError when aborted while waiting", async () => {
			const { limiter } = createLimiter(1, 1);
			await limiter.acquire();
			const controller = new AbortController();
			controller.abort();
			await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(RateLimitError);
		});
	});

	it("exposes bucket state", () => {
		const { limiter } = createLimiter(3, 1);
		limiter.tryAcquire();
		expect(limiter.getState()).toEqual({ capacity: 3, tokens: 2, lastRefillMs: 1000 });
	});

	it("resetStats clears counters", () => {
		const { limiter } = createLimiter(1, 1);
		limiter.tryAcquire();
		limiter.tryAcquire();
		expect(limiter.getStats().misses).toBe(1);
		limiter.resetStats();
		expect(limiter.getStats()).toEqual({ hits: 0, misses: 0, waits: 0, avgWaitMs: 0 });
	});
});
