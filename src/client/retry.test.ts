import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { RateLimitError, TransientApiError, ValidationError } from "../shared/errors.js";
import { computeBackoffMs, retryDelayMs, withRetry } from "./retry.js";

describe("computeBackoffMs", () => {
	it("doubles the base per attempt and adds jitter below the base", () => {
		expect(computeBackoffMs(1, 500, () => 0)).toBe(500);
		expect(computeBackoffMs(3, 500, () => 0)).toBe(2000);
		expect(computeBackoffMs(2, 500, () => 0.5)).toBe(1500);
	});

	it("prefers the rate-limit hint when present", () => {
		expect(retryDelayMs(1, new RateLimitError("slow", 4000), 500, () => 0)).toBe(4000);
		expect(retryDelayMs(1, new RateLimitError("slow"), 500, () => 0)).toBe(500);
	});
});

describe("withRetry", () => {
	const sleeps: number[] = [];
	const options = {
		maxRetries: 2,
		backoffFactorMs: 100,
		logger: silentLogger(),
		random: () => 0,
		sleep: async (ms: number) => {
			sleeps.push(ms);
			return true;
		},
	};

	it("returns the first success", async () => {
		sleeps.length = 0;
		let calls = 0;
		const result = await withRetry(async (attempt) => {
			calls++;
			if (attempt === 0) throw new TransientApiError("blip");
			return "done";
		}, options);
		expect(result).toBe("done");
		expect(calls).toBe(2);
		expect(sleeps).toEqual([100]);
	});

	it("does not retry non-retryable errors", async () => {
		let calls = 0;
		await expect(
			withRetry(async () => {
				calls++;
				throw new ValidationError("bad qty");
			}, options),
		).rejects.toBeInstanceOf(ValidationError);
		expect(calls).toBe(1);
	});

	it("classifies raw errors before deciding", async () => {
		let calls = 0;
		await expect(
			withRetry(async () => {
				calls++;
				throw Object.assign(new Error("reset"), { code: "ECONNRESET" });
			}, options),
		).rejects.toBeInstanceOf(TransientApiError);
		expect(calls).toBe(3);
	});

	it("stops when the sleep is aborted", async () => {
		let calls = 0;
		await expect(
			withRetry(
				async () => {
					calls++;
					throw new TransientApiError("blip");
				},
				{ ...options, sleep: async () => false },
			),
		).rejects.toBeInstanceOf(TransientApiError);
		expect(calls).toBe(1);
	});
});
